/**
 * Agent presets: subagent configs kept as YAML files.
 *
 * One file per agent, keys as in AgentConfig:
 *
 *   name: researcher
 *   systemPrompt: |
 *     You collect background material for the task.
 *   tools: [query_search]
 *   maxIterations: 8
 *
 * `model` may be left out; the manager fills in its default.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { parse } from 'yaml';
import { z } from 'zod';
import { AgentConfigSchema, InvalidConfigError, errorMessage } from '@conclave/agent-contracts';
import type { AgentConfigDraft } from '@conclave/agent-contracts';

const AgentPresetSchema = AgentConfigSchema.extend({
  model: z.string().min(1).optional(),
  /** Left unset so the subagent manager applies its budget */
  maxTotalTokens: z.number().int().nonnegative().optional(),
});

export type AgentPreset = z.output<typeof AgentPresetSchema>;

const PRESET_EXTENSIONS = new Set(['.yaml', '.yml']);

/**
 * Parse and validate one preset document.
 */
export function parseAgentPreset(source: string, origin = 'preset'): AgentConfigDraft {
  let document: unknown;
  try {
    document = parse(source);
  } catch (error) {
    throw new InvalidConfigError(`Invalid YAML in ${origin}`, [errorMessage(error)]);
  }

  const result = AgentPresetSchema.safeParse(document);
  if (!result.success) {
    throw new InvalidConfigError(
      `Invalid agent preset ${origin}`,
      result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    );
  }
  return result.data;
}

/**
 * Load every `*.yaml` / `*.yml` preset in `dir`, sorted by file name.
 */
export async function loadAgentPresets(dir: string): Promise<AgentConfigDraft[]> {
  const files = (await fs.promises.readdir(dir))
    .filter((file) => PRESET_EXTENSIONS.has(path.extname(file)))
    .sort();

  const presets: AgentConfigDraft[] = [];
  const names = new Set<string>();
  for (const file of files) {
    const preset = parseAgentPreset(await fs.promises.readFile(path.join(dir, file), 'utf-8'), file);
    if (names.has(preset.name)) {
      throw new InvalidConfigError(`Duplicate agent preset '${preset.name}' in ${file}`);
    }
    names.add(preset.name);
    presets.push(preset);
  }
  return presets;
}
