import { describe, it, expect } from "vitest";
import { expToNextLevel, addExperience, addItem, useConsumable } from "./progression";
import { makeTestPlayer } from "./test-helpers/makeTestPlayer";
import type { Consumable } from "./types";

const ITEMS: Consumable[] = [{ id: "medkit", name: "Medkit", effect: { op: "heal", amount: 30 } }];

describe("expToNextLevel", () => {
  it("follows 20 + (level - 1) * 10", () => {
    expect(expToNextLevel(1)).toBe(20);
    expect(expToNextLevel(2)).toBe(30);
    expect(expToNextLevel(5)).toBe(60);
  });

  it("is non-decreasing as level increases", () => {
    for (let level = 1; level < 50; level++) {
      expect(expToNextLevel(level + 1)).toBeGreaterThanOrEqual(expToNextLevel(level));
    }
  });
});

describe("addExperience", () => {
  it("accumulates experience below the threshold without leveling", () => {
    const player = makeTestPlayer();

    const result = addExperience(player, 10);

    expect(result.player.level).toBe(1);
    expect(result.player.experience).toBe(10);
    expect(result.log).toEqual(["Test Player gains 10 experience."]);
  });

  it("applies two level-ups in order from a single large award", () => {
    const player = makeTestPlayer({ health: 40 });

    // 20 (level 1) + 30 (level 2) = 50, with 5 left over
    const result = addExperience(player, 55);

    expect(result.player).toMatchObject({
      level: 3,
      experience: 5,
      skillPoints: 2,
      maxHealth: 120,
      health: 120,
      attack: 24,
    });
    expect(result.log).toEqual([
      "Test Player gains 55 experience.",
      "Level up! Test Player is now level 2 (max health 110, attack 22).",
      "Level up! Test Player is now level 3 (max health 120, attack 24).",
    ]);
  });

  it("levels exactly on the threshold and keeps the remainder otherwise", () => {
    expect(addExperience(makeTestPlayer(), 50).player).toMatchObject({ level: 3, experience: 0 });
    expect(addExperience(makeTestPlayer(), 49).player).toMatchObject({ level: 2, experience: 29 });
  });

  it("counts experience already banked towards the next level", () => {
    const player = makeTestPlayer({ level: 2, experience: 25 });

    const result = addExperience(player, 5);

    expect(result.player).toMatchObject({ level: 3, experience: 0 });
  });

  it("treats a negative award as zero", () => {
    const player = makeTestPlayer({ experience: 4 });

    const result = addExperience(player, -30);

    expect(result.player).toEqual(player);
    expect(result.log).toEqual(["Test Player gains 0 experience."]);
  });
});

describe("inventory", () => {
  it("uses a consumable, healing and decrementing the count", () => {
    const player = makeTestPlayer({ health: 50 });

    const result = useConsumable(player, "medkit", ITEMS);

    expect(result.used).toBe(true);
    expect(result.message).toBe("You use a Medkit and recover 30 health.");
    expect(result.player.health).toBe(80);
    expect(result.player.inventory.medkit).toBe(0);
  });

  it("reports the health actually restored near max", () => {
    const result = useConsumable(makeTestPlayer({ health: 90 }), "medkit", ITEMS);

    expect(result.message).toBe("You use a Medkit and recover 10 health.");
    expect(result.player.health).toBe(100);
  });

  it("leaves health and inventory unchanged when none are left", () => {
    const player = makeTestPlayer({ health: 50, inventory: { medkit: 0 } });

    const result = useConsumable(player, "medkit", ITEMS);

    expect(result.used).toBe(false);
    expect(result.message).toBe("You have no Medkit left.");
    expect(result.player.health).toBe(50);
    expect(result.player.inventory).toEqual({ medkit: 0 });
  });

  it("reports an item the catalog does not know as missing", () => {
    const player = makeTestPlayer();

    const result = useConsumable(player, "flare", ITEMS);

    expect(result).toEqual({ player, message: "You have no flare left.", used: false });
  });

  it("adds items to existing and new stacks", () => {
    const player = addItem(addItem(makeTestPlayer(), "medkit", 2), "flare", 1);

    expect(player.inventory).toEqual({ medkit: 3, flare: 1 });
  });
});
