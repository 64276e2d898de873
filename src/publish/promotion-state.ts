/**
 * Branch promotion states in order.
 */
export const PROMOTION_STATES = ["clean", "committed", "merged", "pushed", "restored"] as const;

export type PromotionState = (typeof PROMOTION_STATES)[number];

export type PromotionTransition = `${PromotionState}→${PromotionState}`;

/**
 * Pure function: the state that follows `current` on success, or null once
 * the sequence is finished. The direct variant never switches branches, so
 * it goes clean → committed → pushed and stops there.
 */
export function nextPromotionState(current: PromotionState, direct: boolean): PromotionState | null {
  if (direct) {
    if (current === "clean") return "committed";
    if (current === "committed") return "pushed";
    return null;
  }
  const idx = PROMOTION_STATES.indexOf(current);
  return idx >= PROMOTION_STATES.length - 1 ? null : PROMOTION_STATES[idx + 1];
}

export function transitionName(from: PromotionState, to: PromotionState): PromotionTransition {
  return `${from}→${to}`;
}

/**
 * Whether a failure after reaching `state` may already be visible on the
 * remote. Only a completed push is; a local merge can still be reset.
 */
export function remoteAffected(state: PromotionState): boolean {
  return state === "pushed" || state === "restored";
}
