import type { Verdict } from "./types";

/**
 * Rounds to 2 decimal places with `Math.round` on `value * 100`. Ties are
 * decided on the binary product, so 5.175 rounds to 5.18.
 */
export function roundTo2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Body Mass Index from height (m) and weight (kg), rounded to 2 decimals.
 *
 * Callers validate that both are positive; this does no range checks.
 */
export function deriveBmi(height: number, weight: number): number {
  return roundTo2(weight / (height * height));
}

/**
 * Classifies a BMI value.
 *
 * The bands are right-exclusive. Values in [24.9, 25) belong to no listed band
 * and fall through to "Obese", as do values from 29.9 upwards.
 */
export function deriveVerdict(bmi: number): Verdict {
  if (bmi < 18.5) return "Underweight";
  if (bmi >= 18.5 && bmi < 24.9) return "Normal weight";
  if (bmi >= 25 && bmi < 29.9) return "Overweight";
  return "Obese";
}

function asPositiveNumber(value: unknown): number | null {
  if (typeof value !== "number" || !Number.isFinite(value)) return null;
  return value > 0 ? value : null;
}

/**
 * Derives `{ bmi, verdict }` from raw stored attributes.
 *
 * Returns `null` when height or weight is missing or not a positive number,
 * which can only happen for records written outside the service.
 */
export function deriveHealth(
  height: unknown,
  weight: unknown
): { bmi: number; verdict: Verdict } | null {
  const h = asPositiveNumber(height);
  const w = asPositiveNumber(weight);
  if (h === null || w === null) return null;

  const bmi = deriveBmi(h, w);
  return { bmi, verdict: deriveVerdict(bmi) };
}
