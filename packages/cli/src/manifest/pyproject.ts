// pattern: Functional Core
// Direct dependencies and their group membership from pyproject.toml

import { type Static, Type } from "@sinclair/typebox";

import type { PackageName } from "../python/names.js";
import { parseRequirement, type Requirement } from "../python/requirement.js";
import { ajv, formatAjvErrors } from "../utils/ajv.js";
import { ConfigurationError } from "../utils/errors.js";
import { parseTomlFile, readProjectFile } from "../utils/project-files.js";

export const MANIFEST_NAME = "pyproject.toml";

const RequirementList = Type.Array(Type.String());

export const PyprojectManifest = Type.Object({
  project: Type.Optional(
    Type.Object({
      name: Type.Optional(Type.String()),
      dependencies: Type.Optional(RequirementList),
      "optional-dependencies": Type.Optional(
        Type.Record(Type.String(), RequirementList)
      ),
    })
  ),
  // entries are requirement strings or { include-group = "..." } tables; TOML 0.5
  // arrays cannot mix the two, so a group holding both fails to parse
  "dependency-groups": Type.Optional(
    Type.Record(
      Type.String(),
      Type.Array(Type.Union([Type.String(), Type.Record(Type.String(), Type.Unknown())]))
    )
  ),
});
export type PyprojectManifest = Static<typeof PyprojectManifest>;

const validateManifest = ajv.compile<PyprojectManifest>(PyprojectManifest);

export interface ProjectManifest {
  /** Every declared dependency by canonical name; a later declaration replaces an earlier one */
  direct: Map<PackageName, Requirement>;
  /** Group name → declared members; the main group is "" */
  groups: Map<string, Set<PackageName>>;
}

/**
 * Reads project.dependencies, project.optional-dependencies and
 * dependency-groups. Groups that declare nothing are omitted.
 */
export function parseManifest(
  content: string,
  filePath: string
): ProjectManifest {
  const data = parseTomlFile(content, filePath);
  if (!validateManifest(data)) {
    const errors = formatAjvErrors(validateManifest.errors);
    throw new ConfigurationError(
      `Invalid ${MANIFEST_NAME} at ${filePath}: ${errors.join(", ")}`,
      filePath
    );
  }

  const declared: [group: string, entries: readonly unknown[]][] = [
    ["", data.project?.dependencies ?? []],
    ...Object.entries(data.project?.["optional-dependencies"] ?? {}),
    ...Object.entries(data["dependency-groups"] ?? {}),
  ];

  const direct = new Map<PackageName, Requirement>();
  const groups = new Map<string, Set<PackageName>>();

  for (const [group, entries] of declared) {
    for (const entry of entries) {
      if (typeof entry !== "string") {
        continue;
      }
      const requirement = parseRequirement(entry);
      if (requirement.name.length === 0) {
        continue;
      }
      direct.set(requirement.name, requirement);

      const members = groups.get(group) ?? new Set<PackageName>();
      members.add(requirement.name);
      groups.set(group, members);
    }
  }

  return { direct, groups };
}

/**
 * Reads and parses pyproject.toml from the project directory
 */
export async function loadManifest(
  projectDir: string
): Promise<ProjectManifest> {
  const { filePath, content } = await readProjectFile(projectDir, MANIFEST_NAME);
  return parseManifest(content, filePath);
}
