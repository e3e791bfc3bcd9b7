import { describe, expect, it } from "vitest";
import { SeededRandom, createTrialRandom } from "./random";

const draw = (rng: SeededRandom, count: number): number[] =>
  Array.from({ length: count }, () => rng.random());

describe("SeededRandom", () => {
  it("replays the same stream for the same seed", () => {
    expect(draw(new SeededRandom(42), 5)).toEqual(draw(new SeededRandom(42), 5));
  });

  it("produces different streams for different seeds", () => {
    expect(draw(new SeededRandom(42), 5)).not.toEqual(draw(new SeededRandom(43), 5));
  });

  it("keeps uniform draws inside [0, 1)", () => {
    const values = draw(new SeededRandom("bounds"), 500);
    expect(values.every((value) => value >= 0 && value < 1)).toBe(true);
  });

  it("returns the mean exactly when std is zero", () => {
    expect(new SeededRandom(7).normal(2.1, 0)).toBe(2.1);
  });

  it("centres normal samples on the requested mean", () => {
    const rng = new SeededRandom(11);
    const samples = Array.from({ length: 4000 }, () => rng.normal(10, 1));
    const mean = samples.reduce((total, value) => total + value, 0) / samples.length;
    expect(Math.abs(mean - 10)).toBeLessThan(0.1);
  });
});

describe("createTrialRandom", () => {
  it("gives each trial an independent, reproducible stream", () => {
    expect(createTrialRandom(42, 3).random()).toBe(createTrialRandom(42, 3).random());
    expect(createTrialRandom(42, 3).random()).not.toBe(createTrialRandom(42, 4).random());
  });
});
