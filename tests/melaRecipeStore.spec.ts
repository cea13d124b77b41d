import Database from "better-sqlite3";
import fs from "fs";
import os from "os";
import path from "path";
import { afterAll, beforeAll, describe, expect, it } from "vitest";
import { CollaboratorError } from "../src/domain/errors";
import { MelaRecipeStore } from "../src/services/integrations/melaRecipeStore";

const SCHEMA = `
CREATE TABLE ZRECIPEOBJECT (
  Z_PK INTEGER PRIMARY KEY,
  ZTITLE VARCHAR,
  ZINGREDIENTS VARCHAR,
  ZINSTRUCTIONS VARCHAR,
  ZNOTES VARCHAR,
  ZNUTRITION VARCHAR,
  ZYIELD VARCHAR,
  ZPREPTIME VARCHAR,
  ZCOOKTIME VARCHAR,
  ZTOTALTIME VARCHAR,
  ZFAVORITE INTEGER,
  ZWANTTOCOOK INTEGER,
  ZLINK VARCHAR
)`;

describe("MelaRecipeStore", () => {
  let dir: string;
  let store: MelaRecipeStore;

  beforeAll(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "mela-"));
    const dbPath = path.join(dir, "Mela.sqlite");
    const db = new Database(dbPath);
    db.exec(SCHEMA);
    const insert = db.prepare(
      `INSERT INTO ZRECIPEOBJECT (Z_PK, ZTITLE, ZINGREDIENTS, ZINSTRUCTIONS, ZYIELD, ZPREPTIME, ZCOOKTIME, ZTOTALTIME, ZFAVORITE, ZWANTTOCOOK, ZLINK)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
    );
    insert.run(1, "Tomato Soup", "tomatoes\nonion", "Simmer.", "4", "10 min", "30 min", "40 min", 1, 0, "example.com/soup");
    insert.run(2, "Chicken Curry", "chicken\nTomato paste\nrice", "Braise.", null, null, "45 min", null, 0, 1, null);
    insert.run(3, "Pancakes", "flour\neggs", "Fry.", null, "5 min", null, null, 1, 0, null);
    db.close();

    store = new MelaRecipeStore(dbPath);
  });

  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("searches titles and ingredients case-insensitively, ordered by title", async () => {
    const results = await store.search("tomato");

    expect(results).toEqual([
      { id: 2, title: "Chicken Curry", prepTime: null, cookTime: "45 min", totalTime: null },
      { id: 1, title: "Tomato Soup", prepTime: "10 min", cookTime: "30 min", totalTime: "40 min" },
    ]);
  });

  it("returns full details with boolean flags", async () => {
    expect(await store.get(1)).toEqual({
      id: 1,
      title: "Tomato Soup",
      prepTime: "10 min",
      cookTime: "30 min",
      totalTime: "40 min",
      ingredients: "tomatoes\nonion",
      instructions: "Simmer.",
      notes: null,
      nutrition: null,
      yield: "4",
      favorite: true,
      wantToCook: false,
      link: "example.com/soup",
    });
  });

  it("returns null for an unknown id", async () => {
    expect(await store.get(99)).toBeNull();
  });

  it("lists recipes by flag", async () => {
    expect((await store.list()).map((r) => r.title)).toEqual(["Chicken Curry", "Pancakes", "Tomato Soup"]);
    expect((await store.list("favorites")).map((r) => r.id)).toEqual([3, 1]);
    expect(await store.list("wantToCook")).toEqual([
      { id: 2, title: "Chicken Curry", favorite: false, wantToCook: true },
    ]);
  });

  it("reports a missing database file", async () => {
    const missing = new MelaRecipeStore(path.join(dir, "nope.sqlite"));

    await expect(missing.search("soup")).rejects.toBeInstanceOf(CollaboratorError);
    await expect(missing.search("soup")).rejects.toThrow(
      `Mela database not found at ${path.join(dir, "nope.sqlite")}`
    );
  });

  it("reports a database without the recipe table as a failed query", async () => {
    const emptyPath = path.join(dir, "empty.sqlite");
    new Database(emptyPath).close();

    await expect(new MelaRecipeStore(emptyPath).list()).rejects.toThrow(/^Mela query failed: /);
  });
});
