/** Persisted dependency entry inside info.json. */
export type ManifestDepEntry = {
  url: string;
  rev: string;
  hash: string;
  condition?: string;
};

export type ManifestDeps = Record<string, ManifestDepEntry>;

export type JsonValue = string | number | boolean | null | JsonValue[] | JsonObject;

export type JsonObject = { [key: string]: JsonValue };

/** Formatting facts read from the existing file so a rewrite can keep them. */
export type ManifestFormat = {
  indent: string | number;
  trailingNewline: boolean;
};

export type ManifestDocument = {
  data: JsonObject;
  format: ManifestFormat;
  /** Exact bytes as read, or null when the file did not exist. */
  raw: string | null;
};
