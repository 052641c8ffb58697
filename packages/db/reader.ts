import * as fs from "fs";
import path from "path";
import { asc, eq } from "drizzle-orm";

import type { BookmarkMap } from "@keywordmarks/shared/types/bookmarks";
import type { ProfileSpec } from "@keywordmarks/shared/types/profiles";
import { StoreUnavailableError } from "@keywordmarks/shared/errors";
import logger from "@keywordmarks/shared/logger";

import type { PlacesDB } from "./drizzle";
import { openPlacesDb, PLACES_DB_FILENAME } from "./drizzle";
import { mozKeywords, mozPlaces } from "./schema";

export type ProfileReader = (spec: ProfileSpec) => Promise<BookmarkMap>;

async function selectKeywordRows(db: PlacesDB) {
  return db
    .select({
      keyword: mozKeywords.keyword,
      url: mozPlaces.url,
    })
    .from(mozKeywords)
    .leftJoin(mozPlaces, eq(mozKeywords.placeId, mozPlaces.id))
    .orderBy(asc(mozKeywords.id));
}

/**
 * Reads every keyword bookmark of a single Firefox profile.
 *
 * Keywords without a resolvable place are skipped. Duplicate keywords
 * resolve to the last row. Any failure to open or query the store is
 * reported as a StoreUnavailableError for that profile.
 */
export const readProfile: ProfileReader = async (spec) => {
  // An empty path would resolve against the process cwd
  if (spec.path.length === 0) {
    throw new StoreUnavailableError(spec.path, {
      cause: new Error("Empty profile path"),
    });
  }

  const dbFile = path.join(spec.path, PLACES_DB_FILENAME);
  logger.info(`[StoreReader] Reading keyword bookmarks from "${dbFile}"`);

  // libsql creates missing database files, which must never happen inside a
  // browser profile.
  try {
    await fs.promises.access(dbFile, fs.constants.R_OK);
  } catch (error) {
    throw new StoreUnavailableError(spec.path, { cause: error });
  }

  let places: ReturnType<typeof openPlacesDb> | undefined;
  try {
    places = openPlacesDb(dbFile);
    const rows = await selectKeywordRows(places.db);
    const bookmarks: BookmarkMap = new Map();
    for (const row of rows) {
      if (!row.keyword || !row.url) {
        logger.debug(
          `[StoreReader] Skipping incomplete keyword row ${JSON.stringify(row)}`,
        );
        continue;
      }
      const keyword = `${spec.keywordPrefix}${row.keyword}`;
      bookmarks.set(keyword, {
        keyword,
        url: row.url,
        sourceProfile: spec.path,
      });
    }
    logger.info(
      `[StoreReader] Loaded ${bookmarks.size} keyword bookmarks from "${spec.path}"`,
    );
    return bookmarks;
  } catch (error) {
    throw new StoreUnavailableError(spec.path, { cause: error });
  } finally {
    places?.client.close();
  }
};
