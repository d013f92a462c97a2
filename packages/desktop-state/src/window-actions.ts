import type { ActionOutcome, CommandRunner } from "./types.js";

/** Side-effecting window operations. The locator decides the target; these act on it. */
export interface WindowActions {
  focus(windowId: string): Promise<ActionOutcome>;
  close(windowId: string): Promise<ActionOutcome>;
}

export function createWmctrlWindowActions(run: CommandRunner): WindowActions {
  const invoke = async (flag: "-ia" | "-ic", windowId: string): Promise<ActionOutcome> => {
    const res = await run("wmctrl", [flag, windowId]);
    switch (res.kind) {
      case "ok":
        return { kind: "ok" };
      case "missing":
        return { kind: "failed", reason: "wmctrl is not installed" };
      case "failed":
        return { kind: "failed", reason: res.reason || `wmctrl ${flag} ${windowId} failed` };
    }
  };

  return {
    focus: (windowId) => invoke("-ia", windowId),
    close: (windowId) => invoke("-ic", windowId),
  };
}
