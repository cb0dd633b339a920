import type { TeamMode } from "@teamwire/schemas";

export class ModeState {
  private mode: TeamMode;

  constructor(initial: TeamMode = "sync") {
    this.mode = initial;
  }

  get current(): TeamMode {
    return this.mode;
  }

  /** Any transition is allowed, including to the current mode. */
  set(mode: TeamMode): { previous: TeamMode; changed: boolean } {
    const previous = this.mode;
    this.mode = mode;
    return { previous, changed: previous !== mode };
  }
}
