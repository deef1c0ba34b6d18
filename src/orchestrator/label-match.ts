/** Split a group label value into its trimmed, non-empty group names. */
export function parseGroupLabel(value: string | undefined): string[] {
  if (!value) return [];
  return value
    .split(",")
    .map((s) => s.trim())
    .filter(Boolean);
}

/** Whether a container's group label lists the requested group (case-insensitive). */
export function isMonitored(labelValue: string | undefined, groupName: string): boolean {
  const wanted = groupName.trim().toLowerCase();
  if (!wanted) return false;
  return parseGroupLabel(labelValue).some((group) => group.toLowerCase() === wanted);
}
