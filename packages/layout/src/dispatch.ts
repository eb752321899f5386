/**
 * Coded index dispatch builder
 *
 * Maps each scheme's tags to catalog ids. Only visible tables are reachable
 * through dispatch; internal tables, unused tags and tags past the end of a
 * scheme all dispatch to the catalog's "none" sentinel.
 */

import {
  type CodeScheme,
  type CodeSchemes,
  type Diagnostic,
  type Result,
  createDiagnostic,
  isTagBits,
  MAX_TAG_BITS,
  MIN_TAG_BITS,
} from "@metalayout/frontend";
import type { Catalog, CodedDispatch } from "./types.js";

const buildSchemeDispatch = (
  scheme: CodeScheme,
  catalog: Catalog
): Result<CodedDispatch, readonly Diagnostic[]> => {
  const diagnostics: Diagnostic[] = [];

  if (!isTagBits(scheme.tagBits)) {
    diagnostics.push(
      createDiagnostic(
        "MLG2004",
        `Code scheme '${scheme.name}' has ${scheme.tagBits} tag bits, expected an integer from ${MIN_TAG_BITS} to ${MAX_TAG_BITS}`,
        { location: scheme.location, subjects: [scheme.name] }
      )
    );
  } else if (scheme.tables.length > 2 ** scheme.tagBits) {
    diagnostics.push(
      createDiagnostic(
        "MLG2004",
        `Code scheme '${scheme.name}' lists ${scheme.tables.length} tables but ${scheme.tagBits} tag bits address only ${2 ** scheme.tagBits}`,
        { location: scheme.location, subjects: [scheme.name] }
      )
    );
  }

  const tables: number[] = [];
  const targets: number[] = [];

  for (const name of scheme.tables) {
    if (name === null) {
      tables.push(catalog.none);
      targets.push(catalog.none);
      continue;
    }
    const entry = catalog.byName.get(name);
    if (!entry) {
      diagnostics.push(
        createDiagnostic(
          "MLG2003",
          `Code scheme '${scheme.name}' lists unknown table '${name}'`,
          { location: scheme.location, subjects: [scheme.name, name] }
        )
      );
      continue;
    }
    tables.push(entry.id);
    targets.push(entry.visible ? entry.id : catalog.none);
  }

  if (diagnostics.length > 0) {
    return { ok: false, error: diagnostics };
  }

  return {
    ok: true,
    value: {
      scheme: scheme.name,
      tagBits: scheme.tagBits,
      tables,
      targets,
      none: catalog.none,
    },
  };
};

export const buildCodedDispatch = (
  catalog: Catalog,
  schemes: CodeSchemes
): Result<ReadonlyMap<string, CodedDispatch>, readonly Diagnostic[]> => {
  const dispatch = new Map<string, CodedDispatch>();
  const diagnostics: Diagnostic[] = [];

  for (const [name, scheme] of schemes) {
    const result = buildSchemeDispatch(scheme, catalog);
    if (result.ok) {
      dispatch.set(name, result.value);
    } else {
      diagnostics.push(...result.error);
    }
  }

  return diagnostics.length > 0
    ? { ok: false, error: diagnostics }
    : { ok: true, value: dispatch };
};

/**
 * Schemes that list internal tables. References into them decode, but never
 * dispatch to a table.
 */
export const findInternalSchemeMembers = (
  catalog: Catalog,
  schemes: CodeSchemes
): readonly Diagnostic[] => {
  const warnings: Diagnostic[] = [];

  for (const scheme of schemes.values()) {
    for (const name of scheme.tables) {
      const entry = name === null ? undefined : catalog.byName.get(name);
      if (entry && !entry.visible) {
        warnings.push(
          createDiagnostic(
            "MLG2005",
            `Code scheme '${scheme.name}' lists internal table '${entry.name}'; references to it dispatch to no table`,
            {
              severity: "warning",
              location: scheme.location,
              subjects: [scheme.name, entry.name],
            }
          )
        );
      }
    }
  }

  return warnings;
};

/**
 * Catalog id a tag dispatches to, or the "none" sentinel.
 */
export const dispatchTag = (dispatch: CodedDispatch, tag: number): number =>
  dispatch.targets[tag] ?? dispatch.none;
