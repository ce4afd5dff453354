/** A value of the literal subset gclient accepts in DEPS files. */
export type PyValue = string | number | boolean | null | PyValue[] | PyDict;

export type PyDict = { [key: string]: PyValue };

/** A dependency pinned to a git revision, before variable formatting. */
export type GitDep = {
  type: "git";
  /** Raw "url@rev" template, `{var}` references unresolved. */
  url: string;
  condition?: string;
};

/** cipd packages, gcs objects and other non-git fetches. */
export type OtherDep = {
  type: "other";
  depType: string;
  condition?: string;
};

export type RawDep = GitDep | OtherDep;

export type RecurseDep = {
  path: string;
  depsFile?: string;
};

/** One level of a DEPS graph, as declared in a single DEPS file. */
export type DepsDocument = {
  vars: Record<string, string | boolean>;
  deps: Record<string, RawDep>;
  recursedeps: RecurseDep[];
  useRelativePaths: boolean;
};

/** Hex commit id. Always 40 lowercase characters. */
export type CommitRef = string;

export type DependencyEntry = {
  path: string;
  url: string;
  rev: CommitRef;
  /** SRI digest, or null when the content is not locally verifiable. */
  hash: string | null;
  condition?: string;
};

export type DependencyGraph = DependencyEntry[];
