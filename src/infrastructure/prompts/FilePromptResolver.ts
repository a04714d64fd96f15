import fs from 'fs/promises';
import path from 'path';
import { ValidationError } from '../../core/errors.js';
import type { IPromptResolver, PromptSelection } from '../../core/interfaces/ICollaborators.js';

export const PROMPT_TYPE_TO_FILE: Record<string, string> = {
  contact: 'extract_prompt_contact_about.txt',
  about: 'extract_prompt_contact_about.txt',
  education: 'extract_prompt_education_certifications.txt',
  certifications: 'extract_prompt_education_certifications.txt',
  experience: 'extract_prompt_experience.txt',
  projects: 'extract_prompt_projects.txt',
  skills: 'extract_prompt_skills.txt',
  classify: 'classify_prompt.txt',
};

const DOCUMENT_PLACEHOLDERS = ['{{DOCUMENT_TEXT}}', '{{PDF_TEXT}}'];

/**
 * Loads prompt templates from a directory, caching each file after the first read
 */
export class FilePromptResolver implements IPromptResolver {
  private cache: Map<string, string> = new Map();

  constructor(private promptsDir: string) {}

  async resolve(selection: PromptSelection): Promise<string> {
    if (selection.prompt && selection.prompt.trim() !== '') {
      return selection.prompt;
    }

    if (!isKnownPromptType(selection.promptType)) {
      throw new ValidationError(`Unknown prompt type: ${selection.promptType}`, [
        `prompt_type must be one of ${Object.keys(PROMPT_TYPE_TO_FILE).join(', ')}`,
      ]);
    }

    const filename = PROMPT_TYPE_TO_FILE[selection.promptType];
    const cached = this.cache.get(filename);
    if (cached !== undefined) return cached;

    const template = await fs.readFile(path.join(this.promptsDir, filename), 'utf8');
    this.cache.set(filename, template);
    return template;
  }
}

export function isKnownPromptType(promptType: string): boolean {
  return Object.prototype.hasOwnProperty.call(PROMPT_TYPE_TO_FILE, promptType);
}

/**
 * Substitutes the document text into every placeholder of a template
 */
export function fillTemplate(template: string, documentText: string): string {
  return DOCUMENT_PLACEHOLDERS.reduce((prompt, placeholder) => prompt.split(placeholder).join(documentText), template);
}
