export interface BookmarkEntry {
  // Profile prefix + keyword as stored by the browser
  readonly keyword: string;
  readonly url: string;
  // Directory of the profile the keyword was read from, prefix stripped
  readonly sourceProfile: string;
}

export type BookmarkMap = Map<string, BookmarkEntry>;
