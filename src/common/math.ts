const EDGE_TOLERANCE = 1e-9;

export function isFiniteNumber(value: unknown): value is number {
  return typeof value === "number" && Number.isFinite(value);
}

export function wrapAngle(angle: number): number {
  if (!Number.isFinite(angle)) {
    return angle;
  }
  const twoPi = 2 * Math.PI;
  let wrapped = angle % twoPi;
  if (wrapped > Math.PI) {
    wrapped -= twoPi;
  } else if (wrapped <= -Math.PI) {
    wrapped += twoPi;
  }
  return wrapped;
}

export function nearlyEqual(a: number, b: number, tolerance = EDGE_TOLERANCE): boolean {
  if (a === b) {
    return true;
  }
  const scale = Math.max(1, Math.abs(a), Math.abs(b));
  return Math.abs(a - b) <= tolerance * scale;
}
