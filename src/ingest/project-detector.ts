import fs from "node:fs/promises";
import path from "node:path";
import { compileGlobs, findMatchingGlob } from "./glob-pattern.js";

export const GENERIC_PROJECT_TYPE = "Generic";

type Marker =
  | { readonly file: string }
  | { readonly directory: string }
  | { readonly rootGlob: readonly string[] };

interface MarkerRule {
  readonly label: string;
  /** The rule applies when any group matches; a group needs all its markers. */
  readonly anyOf: readonly (readonly Marker[])[];
}

const MARKER_RULES: readonly MarkerRule[] = [
  { label: "Node.js", anyOf: [[{ file: "package.json" }]] },
  {
    label: "Python",
    anyOf: [
      [{ file: "requirements.txt" }],
      [{ file: "setup.py" }],
      [{ file: "pyproject.toml" }],
    ],
  },
  { label: "Django", anyOf: [[{ file: "manage.py" }]] },
  { label: "Maven", anyOf: [[{ file: "pom.xml" }]] },
  {
    label: "Gradle",
    anyOf: [[{ file: "build.gradle" }], [{ file: "build.gradle.kts" }]],
  },
  { label: "Rust", anyOf: [[{ file: "Cargo.toml" }]] },
  { label: "Go", anyOf: [[{ file: "go.mod" }]] },
  { label: ".NET", anyOf: [[{ rootGlob: ["*.csproj", "*.sln"] }]] },
  {
    label: "Flutter",
    anyOf: [[{ file: "pubspec.yaml" }, { directory: "lib" }]],
  },
  { label: "Docker", anyOf: [[{ file: "Dockerfile" }]] },
  { label: "Ruby", anyOf: [[{ file: "Gemfile" }]] },
  { label: "PHP", anyOf: [[{ file: "composer.json" }]] },
  { label: "Next.js", anyOf: [[{ rootGlob: ["next.config.*"] }]] },
  { label: "Angular", anyOf: [[{ file: "angular.json" }]] },
];

/**
 * Label a project by the marker files at its root. Labels are independent
 * and keep the rule order; a root without markers is `Generic`. The result
 * is descriptive only and never feeds file selection.
 */
export async function detectProjectTypes(
  projectRoot: string,
): Promise<string[]> {
  const rootNames = await listRootFiles(projectRoot);
  const labels: string[] = [];

  for (const rule of MARKER_RULES) {
    for (const group of rule.anyOf) {
      if (await groupMatches(projectRoot, rootNames, group)) {
        labels.push(rule.label);
        break;
      }
    }
  }

  return labels.length > 0 ? labels : [GENERIC_PROJECT_TYPE];
}

async function groupMatches(
  projectRoot: string,
  rootNames: readonly string[],
  group: readonly Marker[],
): Promise<boolean> {
  for (const marker of group) {
    if (!(await markerMatches(projectRoot, rootNames, marker))) {
      return false;
    }
  }
  return true;
}

async function markerMatches(
  projectRoot: string,
  rootNames: readonly string[],
  marker: Marker,
): Promise<boolean> {
  if ("file" in marker) {
    return await isKind(path.join(projectRoot, marker.file), "file");
  }
  if ("directory" in marker) {
    return await isKind(path.join(projectRoot, marker.directory), "directory");
  }
  const globs = compileGlobs(marker.rootGlob);
  return rootNames.some((name) => findMatchingGlob(name, globs) !== null);
}

async function isKind(
  targetPath: string,
  kind: "file" | "directory",
): Promise<boolean> {
  try {
    const stats = await fs.stat(targetPath);
    return kind === "file" ? stats.isFile() : stats.isDirectory();
  } catch {
    return false;
  }
}

async function listRootFiles(projectRoot: string): Promise<string[]> {
  try {
    const entries = await fs.readdir(projectRoot, { withFileTypes: true });
    return entries.filter((entry) => entry.isFile()).map((entry) => entry.name);
  } catch {
    return [];
  }
}
