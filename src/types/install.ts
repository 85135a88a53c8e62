/** Installation channel tokens accepted on the command line. */
export type InstallType = "stable" | "testing" | "daily" | "git" | "onedir";

export const INSTALL_TYPES: readonly InstallType[] = ["stable", "testing", "daily", "git", "onedir"];

/** How Salt should be obtained, with the channel's sub-selector where it has one. */
export type InstallMode =
  | { readonly type: "stable"; readonly version: string }
  | { readonly type: "testing" }
  | { readonly type: "daily" }
  | { readonly type: "git"; readonly revision: string }
  | { readonly type: "onedir"; readonly version: string };

export const LATEST = "latest";

/** True for `stable <version>` requests other than `latest`. */
export function isPinnedStable(mode: InstallMode): boolean {
  return mode.type === "stable" && mode.version !== LATEST;
}

export function describeMode(mode: InstallMode): string {
  switch (mode.type) {
    case "stable":
    case "onedir":
      return `${mode.type} (${mode.version})`;
    case "git":
      return `git (${mode.revision})`;
    default:
      return mode.type;
  }
}
