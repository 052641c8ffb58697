import * as fs from "fs";
import * as os from "os";
import path from "path";

import { openPlacesDb, PLACES_DB_FILENAME } from "./drizzle";
import { mozKeywords, mozPlaces } from "./schema";

let tempRoot: string | undefined;
let exitHandlerRegistered = false;

function ensureTempRoot() {
  if (!tempRoot) {
    tempRoot = fs.mkdtempSync(path.join(os.tmpdir(), "keywordmarks-test-"));
  }
  return tempRoot;
}

function registerExitHandler() {
  if (exitHandlerRegistered) {
    return;
  }

  process.on("exit", () => {
    if (tempRoot && fs.existsSync(tempRoot)) {
      fs.rmSync(tempRoot, { recursive: true, force: true });
    }
  });

  exitHandlerRegistered = true;
}

function placesSchema(uniqueKeywords: boolean) {
  return `
CREATE TABLE moz_places (
  id INTEGER PRIMARY KEY,
  url LONGVARCHAR,
  title LONGVARCHAR
);
CREATE TABLE moz_keywords (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  keyword TEXT${uniqueKeywords ? " UNIQUE" : ""},
  place_id INTEGER,
  post_data TEXT
);
`;
}

export interface TestPlace {
  id: number;
  url: string | null;
}

export interface TestKeyword {
  keyword: string | null;
  placeId: number | null;
}

export interface TestProfileOptions {
  // Name of the profile directory, for paths with unusual characters
  dirName?: string;
  // Firefox declares moz_keywords.keyword UNIQUE; drop it to store duplicates
  uniqueKeywords?: boolean;
}

/**
 * Creates an empty profile directory (no places.sqlite) under a temp root
 * that is removed when the process exits.
 */
export function createTestProfileDir(dirName?: string): string {
  registerExitHandler();
  const parent = fs.mkdtempSync(path.join(ensureTempRoot(), "profile-"));
  if (!dirName) {
    return parent;
  }
  const profileDir = path.join(parent, dirName);
  fs.mkdirSync(profileDir);
  return profileDir;
}

/**
 * Creates a profile directory holding a places.sqlite with the given rows.
 * Keywords are inserted in array order, so their row ids follow it.
 */
export async function createTestProfile(
  places: TestPlace[],
  keywords: TestKeyword[],
  options: TestProfileOptions = {},
): Promise<string> {
  const profileDir = createTestProfileDir(options.dirName);
  const { client, db } = openPlacesDb(path.join(profileDir, PLACES_DB_FILENAME));
  try {
    await client.executeMultiple(
      placesSchema(options.uniqueKeywords ?? true),
    );
    if (places.length > 0) {
      await db.insert(mozPlaces).values(places);
    }
    for (const keyword of keywords) {
      await db.insert(mozKeywords).values(keyword);
    }
  } finally {
    client.close();
  }
  return profileDir;
}
