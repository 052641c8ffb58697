export { readProfile } from "./reader";
export type { ProfileReader } from "./reader";
export { openPlacesDb, PLACES_DB_FILENAME } from "./drizzle";
export type { PlacesDB } from "./drizzle";
export * as schema from "./schema";
