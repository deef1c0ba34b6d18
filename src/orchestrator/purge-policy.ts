export interface PurgeDecisionInput {
  /** Image id the replaced container was running. */
  previousImageId: string;
  /** Progress log returned by the pull stage. */
  pullLog: string;
  /** Image id of the replacement container, when it could be read back. */
  replacementImageId: string | null;
}

/** Decides whether the previous image of an updated container should be deleted. */
export type PurgePolicy = (input: PurgeDecisionInput) => boolean;

/**
 * Default purge policy.
 *
 * A pull log that mentions the previous image id is taken to mean the pull was a no-op.
 * That signal is a substring match and can misfire, so the image is also kept whenever the
 * replacement is known to run on it. Comparing digests before and after the pull would
 * replace the log match entirely.
 */
export const shouldPurgeImage: PurgePolicy = ({ previousImageId, pullLog, replacementImageId }) => {
  if (!previousImageId) return false;
  if (pullLog.toLowerCase().includes(previousImageId.toLowerCase())) return false;
  if (replacementImageId !== null && replacementImageId === previousImageId) return false;
  return true;
};
