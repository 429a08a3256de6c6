/**
 * Prompt Template Service
 *
 * Loads named prompt templates (`<promptsDirectory>/<name>.md`) and fills in
 * `{{variable}}` placeholders. Missing or unreadable templates fall back to
 * the built-in defaults, so loading never fails outward.
 *
 * @module ai/prompt-template-service
 */

import { readFile } from 'fs/promises';
import { existsSync, statSync } from 'fs';
import path from 'path';
import { logger } from '../utils/logger';
import { errorMessage } from '../utils/errors';
import { removeFrontmatter } from '../utils/frontmatter';

export type PromptVariables = Readonly<Record<string, string>>;

export const CHUNK_SUMMARY_PROMPT = 'chunk_summary_prompt';
export const FINAL_SUMMARY_PROMPT = 'final_summary_prompt';
export const VIDEO_SUMMARY_PROMPT = 'final_summary_prompt_video';

export interface PromptService {
  loadTemplate(templateName: string): Promise<string>;
  substituteVariables(template: string, variables?: PromptVariables): string;
}

export const DEFAULT_CHUNK_PROMPT = `You are an expert academic summarizer. Summarize the following content for a study note, focusing on key concepts, main arguments, and actionable insights. Use clear, concise language suitable for graduate-level students.

{{chunk_context}}

Content:
{{content}}`;

export const DEFAULT_FINAL_PROMPT = `You are an expert academic summarizer. Write a comprehensive summary for the following material, synthesizing the main points, arguments, and conclusions. Highlight the most important takeaways and any recommended actions or next steps.

Content:
{{content}}`;

export const DEFAULT_VIDEO_FINAL_PROMPT = `You are an educational content summarizer for video materials. Create a final summary in markdown with these sections:

## Topics Covered
- 3-5 main topics as bullet points

## Key Concepts Explained
- The most important ideas, in 3-5 short paragraphs

## Important Takeaways
- 3-5 practical takeaways as bullet points

## Summary
- One paragraph covering the whole video

## Notable Quotes / Insights
- 1-2 significant quotes as markdown blockquotes

Content:
{{content}}`;

const DEFAULT_TEMPLATES: Readonly<Record<string, string>> = {
  [CHUNK_SUMMARY_PROMPT]: DEFAULT_CHUNK_PROMPT,
  [FINAL_SUMMARY_PROMPT]: DEFAULT_FINAL_PROMPT,
  [VIDEO_SUMMARY_PROMPT]: DEFAULT_VIDEO_FINAL_PROMPT
};

const PLACEHOLDER_PATTERN = /\{\{(.*?)\}\}/g;

/** Prompts shipped with the package, at the repository root. */
export const BUNDLED_PROMPTS_DIR = path.resolve(__dirname, '..', '..', 'prompts');

export interface PromptTemplateServiceOptions {
  /** Configured prompts directory; used when it exists */
  promptsDirectory?: string;
  /** Tried in order when the configured directory is absent or missing */
  fallbackDirectories?: string[];
}

const isDirectory = (dir: string): boolean => {
  try {
    return existsSync(dir) && statSync(dir).isDirectory();
  } catch {
    return false;
  }
};

/**
 * True when `template` references `name` in any spacing (`{{name}}`, `{{ name }}`).
 */
export function hasPlaceholder(template: string, name: string): boolean {
  for (const match of template.matchAll(PLACEHOLDER_PATTERN)) {
    if (match[1].trim() === name) {
      return true;
    }
  }
  return false;
}

export class PromptTemplateService implements PromptService {
  private readonly directory: string | undefined;

  constructor(options: PromptTemplateServiceOptions = {}) {
    this.directory = PromptTemplateService.resolveDirectory(options);
  }

  private static resolveDirectory(options: PromptTemplateServiceOptions): string | undefined {
    if (options.promptsDirectory) {
      if (isDirectory(options.promptsDirectory)) {
        logger.info('Using configured prompts directory', { promptsDirectory: options.promptsDirectory });
        return options.promptsDirectory;
      }
      logger.warn('Configured prompts directory not found', { promptsDirectory: options.promptsDirectory });
    }

    const candidates = options.fallbackDirectories ?? [path.join(process.cwd(), 'prompts'), BUNDLED_PROMPTS_DIR];
    const found = candidates.find(isDirectory);
    if (found) {
      logger.debug('Using prompts directory', { promptsDirectory: found });
      return found;
    }

    logger.warn('No prompts directory found, built-in templates will be used', { candidates });
    return undefined;
  }

  get promptsDirectory(): string | undefined {
    return this.directory;
  }

  /**
   * Load a template by name. Never rejects: a missing file, a read error or an
   * unknown name yields a built-in default.
   */
  async loadTemplate(templateName: string): Promise<string> {
    if (this.directory) {
      const templatePath = path.join(this.directory, `${templateName}.md`);
      try {
        if (existsSync(templatePath)) {
          const content = await readFile(templatePath, 'utf-8');
          logger.info('Loaded prompt template', { templateName });
          return removeFrontmatter(content);
        }
      } catch (error) {
        logger.error('Error loading prompt template', { templateName, templatePath, error: errorMessage(error) });
        return this.getDefaultTemplate(templateName);
      }
    }

    return this.getDefaultTemplate(templateName);
  }

  /**
   * Replace each `{{ key }}` with its value, literally and in one pass. Values
   * are not re-scanned, unknown placeholders stay, unused keys are ignored.
   */
  substituteVariables(template: string, variables: PromptVariables = {}): string {
    return template.replace(PLACEHOLDER_PATTERN, (placeholder: string, rawKey: string) => {
      const key = rawKey.trim();
      return Object.prototype.hasOwnProperty.call(variables, key) ? variables[key] : placeholder;
    });
  }

  async getPrompt(templateName: string, variables?: PromptVariables): Promise<string> {
    const template = await this.loadTemplate(templateName);
    return this.substituteVariables(template, variables);
  }

  async processTemplate(template: string, variables?: PromptVariables): Promise<string> {
    return this.substituteVariables(template, variables);
  }

  /**
   * Read a template from an explicit path (no name resolution, no defaults).
   * A missing or unreadable file yields `''`.
   */
  async loadAndSubstitute(templatePath: string, variables?: PromptVariables): Promise<string> {
    if (!existsSync(templatePath)) {
      logger.error('Prompt template not found', { templatePath });
      return '';
    }

    let template: string;
    try {
      template = await readFile(templatePath, 'utf-8');
    } catch (error) {
      logger.error('Error reading prompt template', { templatePath, error: errorMessage(error) });
      return '';
    }
    return this.substituteVariables(removeFrontmatter(template), variables);
  }

  private getDefaultTemplate(templateName: string): string {
    if (Object.prototype.hasOwnProperty.call(DEFAULT_TEMPLATES, templateName)) {
      logger.info('Using built-in prompt template', { templateName });
      return DEFAULT_TEMPLATES[templateName];
    }

    logger.warn('Unknown prompt template, using final summary default', { templateName });
    return DEFAULT_FINAL_PROMPT;
  }
}
