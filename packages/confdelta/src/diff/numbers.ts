/**
 * Numeric equality with optional tolerances.
 *
 * `NaN` equals `NaN` and `-0` equals `0`; infinities only equal themselves.
 */
export function numbersEqual(left: number, right: number, tolAbs = 0, tolRel = 0): boolean {
  if (Number.isNaN(left) && Number.isNaN(right)) return true;
  if (left === right) return true;

  const diff = Math.abs(left - right);
  // For infinities or a NaN on one side, subtraction produces NaN or Infinity.
  if (!Number.isFinite(diff)) return false;

  if (diff <= tolAbs) return true;

  // Symmetric denominator so the result does not depend on which side is "left".
  const rel = diff / Math.max(1e-30, Math.max(Math.abs(left), Math.abs(right)));
  return rel <= tolRel;
}
