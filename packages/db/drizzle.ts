import { pathToFileURL } from "url";
import { createClient } from "@libsql/client";
import { drizzle } from "drizzle-orm/libsql";

import * as schema from "./schema";

export const PLACES_DB_FILENAME = "places.sqlite";

export function openPlacesDb(dbFile: string) {
  const client = createClient({
    // Profile directories may contain "#", "?" or "%"
    url: pathToFileURL(dbFile).href,
  });
  const db = drizzle(client, { schema, logger: false });
  return { client, db };
}

export type PlacesDB = ReturnType<typeof openPlacesDb>["db"];
