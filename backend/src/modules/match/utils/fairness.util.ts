/**
 * Pull power of one side for a tick.
 *
 * Engagement rate (unique pullers over viewers) keeps small channels
 * competitive against large ones; the log of unique pullers still rewards
 * raw turnout, with diminishing returns.
 */
export function computePullPower(
  engagementRate: number,
  uniquePullers: number,
  baseStrength: number,
): number {
  return engagementRate * baseStrength * Math.log(uniquePullers + 1);
}

/** Positive values move the rope toward side A's goal (+limit). */
export function computeDisplacement(
  powerA: number,
  powerB: number,
  tickScale: number,
): number {
  return (powerA - powerB) * tickScale;
}

export function clampRope(position: number, limit: number): number {
  return Math.min(limit, Math.max(-limit, position));
}
