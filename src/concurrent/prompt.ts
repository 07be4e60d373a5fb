import fs from 'fs/promises';

export const PROMPT_PLACEHOLDER = '{complaint_text}';

/**
 * Substitute the complaint text into every placeholder of the template
 */
export function renderPrompt(template: string, complaintText: string): string {
  return template.split(PROMPT_PLACEHOLDER).join(complaintText);
}

/**
 * Read a prompt template from disk
 *
 * @throws Error when the template has no complaint placeholder
 */
export async function loadPromptTemplate(promptPath: string): Promise<string> {
  const template = await fs.readFile(promptPath, 'utf-8');

  if (!template.includes(PROMPT_PLACEHOLDER)) {
    throw new Error(`Prompt template ${promptPath} is missing the ${PROMPT_PLACEHOLDER} placeholder`);
  }

  return template;
}
