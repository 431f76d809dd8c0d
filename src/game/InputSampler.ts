/** One variable-rate sample of the controls. Axes are in -1..1, y-up. */
export interface RawInputFrame {
  moveX: number;
  moveY: number;
  jump: boolean;
  attack: boolean;
  dash: boolean;
}

/** What a fixed-rate pass consumes. Edge flags cover every sample since the last clear. */
export interface InputSnapshot {
  moveX: number;
  moveY: number;
  jumpHeld: boolean;
  jumpPressed: boolean;
  jumpReleased: boolean;
  attackPressed: boolean;
  dashPressed: boolean;
}

export const NEUTRAL_INPUT: Readonly<InputSnapshot> = Object.freeze({
  moveX: 0,
  moveY: 0,
  jumpHeld: false,
  jumpPressed: false,
  jumpReleased: false,
  attackPressed: false,
  dashPressed: false,
});

/**
 * Captures button edges at render rate and hands them to the fixed-rate pass.
 * clearEdges() runs at the end of every fixed pass, so each press is consumed
 * exactly once however the two rates line up.
 */
export class InputSampler {
  private prevJump = false;
  private prevAttack = false;
  private prevDash = false;
  private state: InputSnapshot = { ...NEUTRAL_INPUT };

  sample(raw: RawInputFrame): void {
    const s = this.state;
    s.moveX = clampAxis(raw.moveX);
    s.moveY = clampAxis(raw.moveY);
    s.jumpHeld = raw.jump;
    if (raw.jump && !this.prevJump) s.jumpPressed = true;
    if (!raw.jump && this.prevJump) s.jumpReleased = true;
    if (raw.attack && !this.prevAttack) s.attackPressed = true;
    if (raw.dash && !this.prevDash) s.dashPressed = true;
    this.prevJump = raw.jump;
    this.prevAttack = raw.attack;
    this.prevDash = raw.dash;
  }

  snapshot(): InputSnapshot {
    return { ...this.state };
  }

  clearEdges(): void {
    this.state.jumpPressed = false;
    this.state.jumpReleased = false;
    this.state.attackPressed = false;
    this.state.dashPressed = false;
  }
}

function clampAxis(v: number): number {
  if (!Number.isFinite(v)) return 0;
  return Math.max(-1, Math.min(1, v));
}
