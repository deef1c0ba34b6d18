import { logger, shortId } from "../config/logger.js";
import { authenticate } from "../credentials/authenticate.js";
import type { CredentialStore } from "../credentials/credential-store.js";
import type { GroupCredential } from "../credentials/types.js";
import type { ContainerDescriptor, ContainerRuntimeClient } from "../runtime/types.js";
import { isMonitored } from "./label-match.js";
import type { PurgePolicy } from "./purge-policy.js";
import { shouldPurgeImage } from "./purge-policy.js";
import type { ProcessResult, UpdateOutcome, UpdateStage } from "./types.js";
import { DiscoveryError, StageError, summarizeOutcomes } from "./types.js";

export interface OrchestratorOptions {
  /** Label whose comma-separated value lists the groups a container belongs to. */
  labelKey: string;
  /** Grace period before the runtime kills a stopping container (seconds). */
  stopTimeoutSeconds: number;
  purgePolicy?: PurgePolicy;
}

async function runStage<T>(stage: UpdateStage, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    throw new StageError(stage, err);
  }
}

/**
 * Finds the containers opted into a group and replaces each one with a fresh
 * container on the newly pulled image: pull -> inspect -> stop -> remove -> create -> start.
 *
 * Containers are processed one at a time. A failing stage ends only that container's
 * pipeline; there is no rollback, so a container whose recreation fails after removal
 * stays gone until the webhook is invoked again. An auto-removing container is waited
 * on until the runtime has deleted it, so its name is free for the replacement.
 */
export class ContainerOrchestrator {
  private readonly runtime: ContainerRuntimeClient;
  private readonly credentials: CredentialStore;
  private readonly labelKey: string;
  private readonly stopTimeoutSeconds: number;
  private readonly purgePolicy: PurgePolicy;

  constructor(runtime: ContainerRuntimeClient, credentials: CredentialStore, options: OrchestratorOptions) {
    this.runtime = runtime;
    this.credentials = credentials;
    this.labelKey = options.labelKey;
    this.stopTimeoutSeconds = options.stopTimeoutSeconds;
    this.purgePolicy = options.purgePolicy ?? shouldPurgeImage;
  }

  /**
   * Authenticate a webhook call and update every container in the group.
   * Throws AuthenticationError before touching the runtime, DiscoveryError if listing fails.
   */
  async process(groupName: string, secret: string | undefined): Promise<ProcessResult> {
    const credential = authenticate(this.credentials, groupName, secret);
    return this.processGroup(credential);
  }

  /** Update every container in an already-authenticated group. */
  async processGroup(credential: GroupCredential): Promise<ProcessResult> {
    let candidates: ContainerDescriptor[];
    try {
      candidates = await this.runtime.listByLabelKey(this.labelKey);
    } catch (err) {
      throw new DiscoveryError(this.labelKey, err);
    }

    logger.info(`Finding and updating containers with label ${this.labelKey}=${credential.name}`, {
      candidates: candidates.length,
    });

    const outcomes: UpdateOutcome[] = [];
    for (const container of candidates) {
      if (!isMonitored(container.labels[this.labelKey], credential.name)) {
        outcomes.push({ status: "skipped", container, reason: "not-monitored" });
        continue;
      }
      outcomes.push(await this.updateContainer(container, credential));
    }

    logger.info(`Webhook ${credential.name} done`, summarizeOutcomes(outcomes));
    return { group: credential.name, outcomes };
  }

  private async updateContainer(container: ContainerDescriptor, credential: GroupCredential): Promise<UpdateOutcome> {
    const id = shortId(container.id);
    try {
      logger.info(`Pulling image for container ${id}@${container.image}`);
      const pullLog = await runStage("pull", () => this.runtime.pull(container.image, credential.registryAuth));
      logger.debug(`Pull log for ${container.image}`, { pullLog });

      // Captured before anything destructive: the only way to rebuild the container.
      const snapshot = await runStage("inspect", () => this.runtime.inspect(container.id));

      logger.info(`Stopping container ${id} (${container.image})`);
      await runStage("stop", () => this.runtime.stop(container.id, this.stopTimeoutSeconds));

      if (snapshot.autoRemove) {
        logger.info(`Waiting for container ${id} to be auto-removed`);
        await runStage("remove", () => this.runtime.waitForRemoval(container.id));
      } else {
        logger.info(`Removing container ${id}`);
        await runStage("remove", () => this.runtime.remove(container.id));
      }

      logger.info(`Re-creating container with image ${snapshot.image}`);
      const newId = await runStage("create", () =>
        this.runtime.create(snapshot.createOptions, snapshot.name),
      );

      logger.info(`Starting container ${shortId(newId)}`);
      await runStage("start", () => this.runtime.start(newId));

      const replacement = await this.describeReplacement(container, newId, snapshot.name);

      if (credential.purgeOldImage) {
        await this.purgeOldImage(container.imageId, pullLog, replacement);
      }

      logger.info(`Container ${id} updated to ${shortId(newId)} (${container.image})`);
      return { status: "succeeded", container, replacement };
    } catch (err) {
      if (!(err instanceof StageError)) throw err;
      logger.warn(`Cannot update container ${id}: ${err.stage} failed`, { error: err.message });
      return { status: "failed", container, stage: err.stage, error: err.message };
    }
  }

  /** Read back the new container; fall back to the old descriptor with the new id. */
  private async describeReplacement(
    container: ContainerDescriptor,
    newId: string,
    name: string | null,
  ): Promise<ContainerDescriptor> {
    try {
      return await this.runtime.describe(newId);
    } catch (err) {
      logger.warn(`Cannot inspect replacement container ${shortId(newId)}`, { err });
      return { ...container, id: newId, names: name ? [`/${name}`] : [] };
    }
  }

  private async purgeOldImage(previousImageId: string, pullLog: string, replacement: ContainerDescriptor): Promise<void> {
    let purge: boolean;
    try {
      // The fallback descriptor carries the old image id, which keeps the image.
      purge = this.purgePolicy({ previousImageId, pullLog, replacementImageId: replacement.imageId });
    } catch (err) {
      logger.warn(`Purge policy failed for image ${shortId(previousImageId)}, keeping it`, { err });
      return;
    }
    if (!purge) {
      logger.info(`Old image ${shortId(previousImageId)} is still current, skipped removing`);
      return;
    }

    logger.info(`Deleting image ${shortId(previousImageId)}`);
    try {
      await this.runtime.removeImage(previousImageId);
    } catch (err) {
      logger.warn(`Cannot remove old image ${shortId(previousImageId)}`, { err });
    }
  }
}
