import { readFile } from 'node:fs/promises';
import fs from 'node:fs';
import path from 'node:path';
import { PipelineConfigError } from './errors.js';

export const PROMPT_NAMES = ['idea', 'idea_followup', 'shopping', 'recipe'] as const;

export type PromptName = (typeof PROMPT_NAMES)[number];

export type PromptSet = Readonly<Record<PromptName, string>>;

function resolvePromptsDir(explicit?: string): string {
  if (explicit) {
    const dir = path.resolve(explicit);
    if (!fs.existsSync(dir)) {
      throw new PipelineConfigError(`Prompt directory not found: ${dir}`);
    }
    return dir;
  }

  const candidates: string[] = [];
  if (process.env.PROMPTS_DIR) candidates.push(path.resolve(process.env.PROMPTS_DIR));
  candidates.push(path.join(__dirname, '..', 'prompts'));
  candidates.push(path.join(process.cwd(), 'src', 'prompts'));

  const found = candidates.find((c) => fs.existsSync(c));
  if (!found) {
    throw new PipelineConfigError(`Prompt directory not found (tried ${candidates.join(', ')})`);
  }
  return found;
}

/**
 * Reads every prompt template from `<dir>/<name>.md`. A missing or blank
 * template is a configuration error, raised at startup.
 */
export async function loadPrompts(dir?: string): Promise<PromptSet> {
  const base = resolvePromptsDir(dir);

  const entries = await Promise.all(
    PROMPT_NAMES.map(async (name) => {
      const file = path.join(base, `${name}.md`);
      let text: string;
      try {
        text = await readFile(file, 'utf-8');
      } catch (error) {
        throw new PipelineConfigError(`Cannot read prompt '${name}' from ${file}: ${String(error)}`);
      }
      if (!text.trim()) {
        throw new PipelineConfigError(`Prompt '${name}' at ${file} is empty`);
      }
      return [name, text] as const;
    }),
  );

  const prompts: Record<PromptName, string> = { idea: '', idea_followup: '', shopping: '', recipe: '' };
  for (const [name, text] of entries) {
    prompts[name] = text;
  }
  return prompts;
}
