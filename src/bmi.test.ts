import { describe, expect, test } from "vitest";
import { deriveBmi, deriveHealth, deriveVerdict, roundTo2 } from "./bmi";

describe("bmi derivation", () => {
  test("rounds weight / height^2 to 2 decimals", () => {
    expect(deriveBmi(1.75, 70.2)).toBe(22.92);
  });

  test("exact values stay exact", () => {
    expect(deriveBmi(2, 100)).toBe(25);
    expect(deriveBmi(1, 18)).toBe(18);
  });

  test("roundTo2 rounds up from the third decimal", () => {
    expect(roundTo2(22.926)).toBe(22.93);
    expect(roundTo2(22.924)).toBe(22.92);
  });

  test("ties are decided on the binary product", () => {
    expect(deriveBmi(2, 20.7)).toBe(5.18);
  });
});

describe("verdict bands", () => {
  test("underweight below 18.5", () => {
    expect(deriveVerdict(18.49)).toBe("Underweight");
  });

  test("normal weight from 18.5 up to 24.9", () => {
    expect(deriveVerdict(18.5)).toBe("Normal weight");
    expect(deriveVerdict(24.89)).toBe("Normal weight");
  });

  test("the [24.9, 25) gap falls through to obese", () => {
    expect(deriveVerdict(24.9)).toBe("Obese");
    expect(deriveVerdict(24.95)).toBe("Obese");
  });

  test("overweight from 25 up to 29.9", () => {
    expect(deriveVerdict(25)).toBe("Overweight");
    expect(deriveVerdict(29.89)).toBe("Overweight");
  });

  test("obese from 29.9", () => {
    expect(deriveVerdict(29.9)).toBe("Obese");
    expect(deriveVerdict(41.2)).toBe("Obese");
  });
});

describe("deriveHealth", () => {
  test("derives bmi and verdict together", () => {
    expect(deriveHealth(1.75, 70.2)).toEqual({
      bmi: 22.92,
      verdict: "Normal weight",
    });
  });

  test("returns null for unusable height or weight", () => {
    expect(deriveHealth(undefined, 70)).toBeNull();
    expect(deriveHealth(1.7, "70")).toBeNull();
    expect(deriveHealth(0, 70)).toBeNull();
    expect(deriveHealth(1.7, -1)).toBeNull();
  });
});
