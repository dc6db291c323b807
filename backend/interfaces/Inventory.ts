/**
 * One line of the resource inventory shown in the critical alert.
 * `count` is null when the listing call failed.
 */
export interface ResourceCount {
  label: string;
  count: number | null;
}
