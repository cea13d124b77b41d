// src/services/integrations/melaRecipeStore.ts
// Read-only access to the Mela recipe app's SQLite database

import Database from "better-sqlite3";
import fs from "fs";
import { CollaboratorError, errorMessage } from "../../domain/errors";
import {
  RecipeCatalog,
  RecipeDetails,
  RecipeListFilter,
  RecipeListItem,
  RecipeSummary,
} from "./types";

type SummaryRow = {
  id: number;
  title: string;
  prep_time: string | null;
  cook_time: string | null;
  total_time: string | null;
};

type DetailRow = SummaryRow & {
  ingredients: string | null;
  instructions: string | null;
  notes: string | null;
  nutrition: string | null;
  yield: string | null;
  favorite: number | null;
  want_to_cook: number | null;
  link: string | null;
};

type ListRow = {
  id: number;
  title: string;
  favorite: number | null;
  want_to_cook: number | null;
};

const LIST_WHERE: Record<RecipeListFilter, string> = {
  all: "",
  favorites: "WHERE ZFAVORITE = 1",
  wantToCook: "WHERE ZWANTTOCOOK = 1",
};

function toSummary(row: SummaryRow): RecipeSummary {
  return {
    id: row.id,
    title: row.title,
    prepTime: row.prep_time,
    cookTime: row.cook_time,
    totalTime: row.total_time,
  };
}

export class MelaRecipeStore implements RecipeCatalog {
  constructor(
    private readonly dbPath: string,
    private readonly busyTimeoutMs: number = 5000
  ) {}

  async search(query: string): Promise<RecipeSummary[]> {
    return this.withConnection((db) => {
      const pattern = `%${query}%`;
      const rows = db
        .prepare<[string, string], SummaryRow>(
          `SELECT
             Z_PK AS id,
             ZTITLE AS title,
             ZPREPTIME AS prep_time,
             ZCOOKTIME AS cook_time,
             ZTOTALTIME AS total_time
           FROM ZRECIPEOBJECT
           WHERE ZTITLE LIKE ? OR ZINGREDIENTS LIKE ?
           ORDER BY ZTITLE`
        )
        .all(pattern, pattern);
      return rows.map(toSummary);
    });
  }

  async get(id: number): Promise<RecipeDetails | null> {
    return this.withConnection((db) => {
      const row = db
        .prepare<[number], DetailRow>(
          `SELECT
             Z_PK AS id,
             ZTITLE AS title,
             ZINGREDIENTS AS ingredients,
             ZINSTRUCTIONS AS instructions,
             ZNOTES AS notes,
             ZNUTRITION AS nutrition,
             ZYIELD AS yield,
             ZPREPTIME AS prep_time,
             ZCOOKTIME AS cook_time,
             ZTOTALTIME AS total_time,
             ZFAVORITE AS favorite,
             ZWANTTOCOOK AS want_to_cook,
             ZLINK AS link
           FROM ZRECIPEOBJECT
           WHERE Z_PK = ?`
        )
        .get(id);
      if (!row) return null;
      return {
        ...toSummary(row),
        ingredients: row.ingredients,
        instructions: row.instructions,
        notes: row.notes,
        nutrition: row.nutrition,
        yield: row.yield,
        favorite: Boolean(row.favorite),
        wantToCook: Boolean(row.want_to_cook),
        link: row.link,
      };
    });
  }

  async list(filter: RecipeListFilter = "all"): Promise<RecipeListItem[]> {
    return this.withConnection((db) => {
      const rows = db
        .prepare<[], ListRow>(
          `SELECT
             Z_PK AS id,
             ZTITLE AS title,
             ZFAVORITE AS favorite,
             ZWANTTOCOOK AS want_to_cook
           FROM ZRECIPEOBJECT
           ${LIST_WHERE[filter]}
           ORDER BY ZTITLE`
        )
        .all();
      return rows.map((row) => ({
        id: row.id,
        title: row.title,
        favorite: Boolean(row.favorite),
        wantToCook: Boolean(row.want_to_cook),
      }));
    });
  }

  /** Opens the database for one call; Mela may rewrite the file between calls. */
  private withConnection<T>(fn: (db: Database.Database) => T): T {
    if (!fs.existsSync(this.dbPath)) {
      throw new CollaboratorError(`Mela database not found at ${this.dbPath}`, "recipes");
    }

    let db: Database.Database;
    try {
      db = new Database(this.dbPath, {
        readonly: true,
        fileMustExist: true,
        timeout: this.busyTimeoutMs,
      });
    } catch (err) {
      throw new CollaboratorError(`Cannot open Mela database: ${errorMessage(err)}`, "recipes");
    }

    try {
      return fn(db);
    } catch (err) {
      throw new CollaboratorError(`Mela query failed: ${errorMessage(err)}`, "recipes");
    } finally {
      db.close();
    }
  }
}
