import { describe, it, expect } from "vitest";
import { takeDamage, heal, isAlive, toWholeAmount } from "./character";
import { makeTestEnemy } from "./test-helpers/makeTestPlayer";

const AMOUNTS = [-50, -1, 0, 0.5, 7.9, 30, 99, 100, 101, 1e9, NaN, Infinity, -Infinity];

describe("Character model", () => {
  it("keeps health within [0, maxHealth] for any damage or heal amount", () => {
    for (const health of [0, 1, 50, 100]) {
      const character = makeTestEnemy({ health, maxHealth: 100 });
      for (const amount of AMOUNTS) {
        const damaged = takeDamage(character, amount).character.health;
        const healed = heal(character, amount).character.health;

        expect(damaged).toBeGreaterThanOrEqual(0);
        expect(damaged).toBeLessThanOrEqual(100);
        expect(healed).toBeGreaterThanOrEqual(0);
        expect(healed).toBeLessThanOrEqual(100);
      }
    }
  });

  it("reports the damage actually applied, not the amount requested", () => {
    const character = makeTestEnemy({ health: 10, maxHealth: 50 });

    const { character: after, applied } = takeDamage(character, 25);

    expect(after.health).toBe(0);
    expect(applied).toBe(10);
  });

  it("truncates fractional amounts and ignores negative ones", () => {
    const character = makeTestEnemy({ health: 50, maxHealth: 50 });

    expect(takeDamage(character, 7.9)).toEqual({ character: { ...character, health: 43 }, applied: 7 });
    expect(takeDamage(character, -5)).toEqual({ character, applied: 0 });
    expect(heal({ ...character, health: 20 }, -5).applied).toBe(0);
  });

  it("reports only the health restored when healing near max", () => {
    const character = makeTestEnemy({ health: 90, maxHealth: 100 });

    const { character: after, applied } = heal(character, 30);

    expect(after.health).toBe(100);
    expect(applied).toBe(10);
  });

  it("does not mutate the character it is given", () => {
    const character = makeTestEnemy({ health: 50, maxHealth: 50 });

    takeDamage(character, 20);
    heal(character, 20);

    expect(character.health).toBe(50);
  });

  it("coerces amounts to non-negative integers", () => {
    expect(toWholeAmount(12.7)).toBe(12);
    expect(toWholeAmount(-3)).toBe(0);
    expect(toWholeAmount(NaN)).toBe(0);
    expect(toWholeAmount(Infinity)).toBe(0);
  });

  it("is alive only above 0 health", () => {
    expect(isAlive(makeTestEnemy({ health: 0 }))).toBe(false);
    expect(isAlive(makeTestEnemy({ health: 1 }))).toBe(true);
  });
});
