import { ParseError } from "../core/errors.js";
import type { DepsDocument, PyDict, PyValue, RawDep, RecurseDep } from "../types/deps.js";
import { parseDepsSource } from "./parser.js";

function isDict(value: PyValue | undefined): value is PyDict {
  return value !== null && value !== undefined && typeof value === "object" && !Array.isArray(value);
}

function optionalString(dict: PyDict, key: string, location: string): string | undefined {
  const value = dict[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string") throw new ParseError(`"${key}" must be a string`, location);
  return value;
}

function readVars(value: PyValue | undefined): Record<string, string | boolean> {
  if (value === undefined) return {};
  if (!isDict(value)) throw new ParseError("vars must be a dictionary", "vars");
  const vars: Record<string, string | boolean> = {};
  for (const [name, v] of Object.entries(value)) {
    if (typeof v === "string" || typeof v === "boolean") {
      vars[name] = v;
    } else if (typeof v === "number") {
      vars[name] = String(v);
    } else {
      throw new ParseError("var values must be strings or booleans", `vars.${name}`);
    }
  }
  return vars;
}

function readDep(path: string, value: PyValue): RawDep {
  const location = `deps["${path}"]`;
  if (typeof value === "string") {
    return { type: "git", url: value };
  }
  if (!isDict(value)) {
    throw new ParseError("dependency must be a url string or a dictionary", location);
  }

  const condition = optionalString(value, "condition", `${location}.condition`);
  const depType = optionalString(value, "dep_type", `${location}.dep_type`) ?? "git";
  if (depType !== "git") {
    return { type: "other", depType, condition };
  }

  const url = optionalString(value, "url", `${location}.url`);
  if (url === undefined) {
    throw new ParseError("git dependency has no url", `${location}.url`);
  }
  return { type: "git", url, condition };
}

function readDeps(value: PyValue | undefined): Record<string, RawDep> {
  if (value === undefined) return {};
  if (!isDict(value)) throw new ParseError("deps must be a dictionary", "deps");
  const deps: Record<string, RawDep> = {};
  for (const [path, dep] of Object.entries(value)) {
    // `None` entries unset a dependency inherited from elsewhere
    if (dep === null) continue;
    deps[path] = readDep(path, dep);
  }
  return deps;
}

function readRecurseDeps(value: PyValue | undefined): RecurseDep[] {
  if (value === undefined) return [];
  if (!Array.isArray(value)) throw new ParseError("recursedeps must be a list", "recursedeps");
  return value.map((item, i) => {
    if (typeof item === "string") return { path: item };
    // legacy form: ("path", "DEPS.chromium")
    if (Array.isArray(item) && item.length === 2) {
      const [path, depsFile] = item;
      if (typeof path === "string" && typeof depsFile === "string") return { path, depsFile };
    }
    throw new ParseError("recursedeps entries must be paths or (path, file) pairs", `recursedeps[${i}]`);
  });
}

/** Parse DEPS source into the one-level document the resolver walks. */
export function parseDepsDocument(source: string): DepsDocument {
  const assignments = parseDepsSource(source);
  const useRelativePaths = assignments.use_relative_paths ?? false;
  if (typeof useRelativePaths !== "boolean") {
    throw new ParseError("use_relative_paths must be a boolean", "use_relative_paths");
  }

  return {
    vars: readVars(assignments.vars),
    deps: readDeps(assignments.deps),
    recursedeps: readRecurseDeps(assignments.recursedeps),
    useRelativePaths,
  };
}
