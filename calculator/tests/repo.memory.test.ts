import { beforeEach, describe, expect, it } from "vitest";
import { MemoryConfigurationRepo } from "../src/adapters/repo.memory";
import { defaultFinancing, defaultOperations } from "../src/core/analyze";
import type { SavedConfigurationDraft } from "../src/core/dto";

describe("MemoryConfigurationRepo", () => {
  let repo: MemoryConfigurationRepo;
  let draft: SavedConfigurationDraft;

  beforeEach(() => {
    let nextId = 1;
    let tick = 0;
    repo = new MemoryConfigurationRepo(
      () => `cfg-${nextId++}`,
      () => new Date(Date.UTC(2026, 0, 1, 0, 0, tick++))
    );
    draft = {
      name: "Duplex on Elm",
      model: "house_hack",
      financing: defaultFinancing(),
      operations: defaultOperations(),
    };
  });

  it("should assign an id and timestamp on save", async () => {
    const saved = await repo.save(draft);

    expect(saved).toEqual({
      ...draft,
      id: "cfg-1",
      createdAt: "2026-01-01T00:00:00.000Z",
    });
  });

  it("should store and retrieve configurations", async () => {
    const saved = await repo.save(draft);

    expect(await repo.getById(saved.id)).toEqual(saved);
    expect(await repo.getById("missing")).toBeNull();
  });

  it("should list in creation order", async () => {
    await repo.save(draft);
    await repo.save({ ...draft, name: "Condo", model: "whole_unit" });

    const names = (await repo.list()).map((c) => c.name);
    expect(names).toEqual(["Duplex on Elm", "Condo"]);
  });

  it("should not share input objects with the caller", async () => {
    const saved = await repo.save(draft);
    draft.financing.purchasePrice = 1;

    expect((await repo.getById(saved.id))?.financing.purchasePrice).toBe(500000);
  });

  it("should not expose stored objects through reads", async () => {
    const saved = await repo.save(draft);

    saved.operations.monthlyGrossRent = 1;
    (await repo.list())[0].financing.purchasePrice = 999;
    const fetched = await repo.getById(saved.id);
    if (fetched) fetched.operations.vacancyRatePct = 99;

    const stored = await repo.getById(saved.id);
    expect(stored?.financing.purchasePrice).toBe(500000);
    expect(stored?.operations.monthlyGrossRent).toBe(3000);
    expect(stored?.operations.vacancyRatePct).toBe(5);
  });

  it("should delete configurations", async () => {
    const saved = await repo.save(draft);

    expect(await repo.delete(saved.id)).toBe(true);
    expect(await repo.delete(saved.id)).toBe(false);
    expect(repo.count()).toBe(0);
  });

  it("should clear all data", async () => {
    await repo.save(draft);
    repo.clear();

    expect(await repo.list()).toEqual([]);
  });
});
