// pattern: Functional Core
// Table and JSON presentation of an outdated check

import Table from "cli-table3";

import { MAIN_GROUP } from "../graph/types.js";

import type {
  AncestorBucketView,
  DescribedEntry,
  OutdatedCheckResult,
  OutdatedSection,
} from "./types.js";
import type { ChalkInstance } from "chalk";

export interface RenderOptions {
  showHeaders: boolean;
  /** Adds the Constraint and Dependents columns */
  showWhy: boolean;
  paint: ChalkInstance;
}

const INDENT = "  ";

// Borderless layout; columns are separated by padding alone
const BORDERLESS = {
  top: "",
  "top-mid": "",
  "top-left": "",
  "top-right": "",
  bottom: "",
  "bottom-mid": "",
  "bottom-left": "",
  "bottom-right": "",
  left: "",
  "left-mid": "",
  mid: "",
  "mid-mid": "",
  right: "",
  "right-mid": "",
  middle: "",
};

export function tableHeaders(showWhy: boolean): string[] {
  return showWhy
    ? ["Package", "Current", "Latest", "Constraint", "Dependents", "Description"]
    : ["Package", "Current", "Latest", "Description"];
}

function entryRow(
  entry: DescribedEntry,
  options: RenderOptions,
  nameCell: string
): string[] {
  const { paint } = options;
  const latestColor =
    entry.latestStatus === "upgradable" ? paint.red : paint.yellow;

  const row = [nameCell, paint.bold(entry.current), latestColor(entry.latest)];
  if (options.showWhy) {
    row.push(entry.constraint ?? "", entry.dependents.join(", "));
  }
  row.push(entry.summary);
  return row;
}

function labelRow(label: string, options: RenderOptions): string[] {
  const width = tableHeaders(options.showWhy).length;
  return [label, ...Array.from({ length: width - 1 }, () => "")];
}

function bucketRows(view: AncestorBucketView, options: RenderOptions): string[][] {
  const { paint } = options;

  switch (view.kind) {
    case "lone":
      return [entryRow(view.entry, options, paint.cyan(view.entry.name))];
    case "unknown":
      return [
        labelRow(paint.dim("Unknown ancestor"), options),
        ...view.members.map(member =>
          entryRow(member, options, `${INDENT}${paint.cyan(member.name)}`)
        ),
      ];
    case "ancestor": {
      const head = view.head
        ? entryRow(view.head, options, paint.cyan(view.head.name))
        : labelRow(paint.cyan(view.ancestor), options);
      return [
        head,
        ...view.members.map(member =>
          entryRow(member, options, `${INDENT}${paint.italic.cyan(member.name)}`)
        ),
      ];
    }
  }
}

/**
 * Table rows for one section: a `[group:<name>]` title for named groups,
 * then either one row per entry or the ancestor layout
 */
export function sectionRows(
  section: OutdatedSection,
  options: RenderOptions
): string[][] {
  const rows: string[][] = [];
  if (section.group !== MAIN_GROUP) {
    rows.push(labelRow(options.paint.bold(`[group:${section.group}]`), options));
  }

  if (section.ancestorBuckets) {
    for (const view of section.ancestorBuckets) {
      rows.push(...bucketRows(view, options));
    }
  } else {
    for (const entry of section.entries) {
      rows.push(entryRow(entry, options, options.paint.cyan(entry.name)));
    }
  }
  return rows;
}

export function renderEmptyResult(
  result: OutdatedCheckResult,
  paint: ChalkInstance
): string {
  const lines = [paint.yellow("No outdated packages found.")];
  if (!result.outdatedKnown) {
    lines.push(
      paint.dim(
        "Note: Could not check for outdated packages (no virtual environment)."
      ),
      `Total packages in uv.lock: ${result.lockedPackageCount}`
    );
  } else {
    lines.push(
      `Total packages: ${result.lockedPackageCount}`,
      `Checked ${result.checkedCount} packages for updates`
    );
  }
  return lines.join("\n");
}

/** Renders the check as a borderless table, or the empty-result message */
export function renderOutdatedReport(
  result: OutdatedCheckResult,
  options: RenderOptions
): string {
  if (result.entries.length === 0) {
    return renderEmptyResult(result, options.paint);
  }

  const table = new Table({
    ...(options.showHeaders
      ? { head: tableHeaders(options.showWhy).map(h => options.paint.bold(h)) }
      : {}),
    chars: BORDERLESS,
    style: { head: [], border: [], "padding-left": 0, "padding-right": 2 },
  });

  result.sections.forEach((section, index) => {
    if (index > 0) {
      table.push(labelRow("", options));
    }
    table.push(...sectionRows(section, options));
  });

  return table.toString();
}

/** Plain JSON document for `--json` */
export function renderOutdatedJson(result: OutdatedCheckResult): string {
  return JSON.stringify(
    {
      projectDir: result.projectDir,
      lockedPackageCount: result.lockedPackageCount,
      outdatedKnown: result.outdatedKnown,
      checkedCount: result.checkedCount,
      metadataAvailable: result.metadataAvailable,
      groups: result.sections.map(section => ({
        group: section.group === MAIN_GROUP ? null : section.group,
        packages: section.entries,
      })),
    },
    null,
    2
  );
}
