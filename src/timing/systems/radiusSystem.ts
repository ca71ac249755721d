import { RADIUS_MAX, RADIUS_STEP } from "../constants";

export interface RadiusState {
  triggerRadius: number;
  radiusLatch: boolean;
}

export function nextTriggerRadius(radius: number) {
  return radius >= RADIUS_MAX ? 0 : radius + RADIUS_STEP;
}

export function isLadderRadius(radius: number) {
  return Number.isInteger(radius) && radius >= 0 && radius <= RADIUS_MAX && radius % RADIUS_STEP === 0;
}

/**
 * Edge-triggered: one step per press, however many ticks the press is held.
 * Returns true when the radius changed this tick.
 */
export function cycleRadius(state: RadiusState, pressed: boolean) {
  if (!pressed) {
    state.radiusLatch = false;
    return false;
  }
  if (state.radiusLatch) return false;

  state.triggerRadius = nextTriggerRadius(state.triggerRadius);
  state.radiusLatch = true;
  return true;
}
