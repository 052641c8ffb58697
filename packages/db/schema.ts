import { integer, sqliteTable, text } from "drizzle-orm/sqlite-core";

// Subset of the Firefox places schema. The browser owns these tables; only
// the columns read here are declared.

export const mozPlaces = sqliteTable("moz_places", {
  id: integer("id").primaryKey(),
  url: text("url"),
  title: text("title"),
});

export const mozKeywords = sqliteTable("moz_keywords", {
  id: integer("id").primaryKey(),
  keyword: text("keyword"),
  placeId: integer("place_id"),
  postData: text("post_data"),
});
