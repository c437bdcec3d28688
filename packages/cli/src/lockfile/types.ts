import { type Static, Type } from "@sinclair/typebox";

/**
 * A dependency as declared inside a uv.lock entry: either a bare string or a
 * `{ name = "...", marker = "...", extra = [...] }` table
 */
export const LockDependency = Type.Union([
  Type.String(),
  Type.Object({
    name: Type.String(),
    marker: Type.Optional(Type.String()),
    extra: Type.Optional(Type.Array(Type.String())),
  }),
]);
export type LockDependency = Static<typeof LockDependency>;

/** A `{ name, specifier }` constraint recorded under `metadata.requires-dist` */
export const LockRequiresDist = Type.Object({
  name: Type.String(),
  specifier: Type.Optional(Type.String()),
  marker: Type.Optional(Type.String()),
  extras: Type.Optional(Type.Array(Type.String())),
});
export type LockRequiresDist = Static<typeof LockRequiresDist>;

export const LockPackage = Type.Object({
  name: Type.String(),
  // absent for dynamic workspace members
  version: Type.Optional(Type.String()),
  dependencies: Type.Optional(Type.Array(LockDependency)),
  "optional-dependencies": Type.Optional(
    Type.Record(Type.String(), Type.Array(LockDependency))
  ),
  "dev-dependencies": Type.Optional(
    Type.Record(Type.String(), Type.Array(LockDependency))
  ),
  metadata: Type.Optional(
    Type.Object({
      "requires-dist": Type.Optional(Type.Array(LockRequiresDist)),
    })
  ),
  // extras of this package materialized in the environment
  extra: Type.Optional(Type.Array(Type.String())),
});
export type LockPackage = Static<typeof LockPackage>;

export const Lockfile = Type.Object({
  version: Type.Optional(Type.Number()),
  "requires-python": Type.Optional(Type.String()),
  package: Type.Optional(Type.Array(LockPackage)),
});
export type Lockfile = Static<typeof Lockfile>;

/**
 * Dependency declaration with its two shapes told apart
 */
export type DependencyDeclaration =
  | { kind: "bare"; raw: string }
  | {
      kind: "table";
      name: string;
      marker: string | null;
      extras: readonly string[];
    };
