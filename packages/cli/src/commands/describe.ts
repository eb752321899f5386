/**
 * metalayout describe command - print ids, widths and dispatch
 */

import {
  type LayoutArtifacts,
  constantWidth,
  describeFormula,
} from "@metalayout/layout";
import type { CommandError, ResolvedConfig, Result } from "../types.js";
import { runPipeline } from "./pipeline.js";

export const describeArtifacts = (
  artifacts: LayoutArtifacts
): readonly string[] => {
  const { catalog } = artifacts;
  const lines = [
    `Tables: ${catalog.entries.length} (TABLE_COUNT ${catalog.tableCount}, TABLE_NONE ${catalog.none})`,
  ];

  for (const entry of catalog.entries) {
    const formula = artifacts.widths.get(entry.name);
    const visibility = entry.visible ? "" : " (internal)";
    if (!formula) {
      lines.push(`  ${entry.id} ${entry.name}${visibility}`);
      continue;
    }
    const fixed = constantWidth(formula);
    lines.push(
      `  ${entry.id} ${entry.name}${visibility}: ${describeFormula(formula)}${fixed === undefined ? "" : ` = ${fixed}`}`
    );
  }

  if (artifacts.dispatch.size > 0) {
    lines.push("Code schemes:");
    for (const dispatch of artifacts.dispatch.values()) {
      const tags = dispatch.targets.map(
        (id, tag) => `${tag}=${catalog.byId.get(id)?.name ?? "none"}`
      );
      lines.push(
        `  ${dispatch.scheme} (${dispatch.tagBits} tag bits): ${tags.join(", ")}`
      );
    }
  }

  return lines;
};

export const describeCommand = (
  config: ResolvedConfig
): Result<void, CommandError> => {
  const generation = runPipeline(config);
  if (!generation.ok) {
    return generation;
  }

  for (const line of describeArtifacts(generation.value.artifacts)) {
    console.log(line);
  }
  return { ok: true, value: undefined };
};
