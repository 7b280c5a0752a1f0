import { Inject, Injectable } from '@nestjs/common';
import { AppError, GenerationUnavailable, TemplateInputError, toError } from '@contractflow/shared';
import { DocumentRole } from '../domain/document';
import { ContractTemplate } from '../templates/contract-templates';
import { TemplateCatalog } from '../templates/template-catalog';
import { GenerationPrompt, TEXT_GENERATOR, TextGenerator } from './text-generator';

const SYSTEM_PROMPT =
  'You draft healthcare and insurance contract documents. Write plain text only, ' +
  'one section per heading in the form "## <Section>", using the facts supplied and nothing invented.';

export function buildPrompt(template: ContractTemplate, inputs: Record<string, string>): GenerationPrompt {
  const facts = template.variables.map((name) => `${name}: ${inputs[name]}`);
  const lines = [
    `Document: ${template.title}`,
    `Prepared for: ${template.role}`,
    '',
    'Facts:',
    ...facts,
    '',
    'Sections, in order:',
    ...template.sections.map((section, i) => `${i + 1}. ${section}`),
  ];
  return { system: SYSTEM_PROMPT, user: lines.join('\n') };
}

/** Strips markdown fences and non-breaking spaces that models like to add. */
export function normalizeContent(raw: string): string {
  return raw
    .replace(/```[a-z]*\n?/gi, '')
    .replace(/\u00a0/g, ' ')
    .trim();
}

@Injectable()
export class GenerationAdapter {
  constructor(
    private readonly catalog: TemplateCatalog,
    @Inject(TEXT_GENERATOR) private readonly generator: TextGenerator
  ) {}

  validateInputs(template: ContractTemplate, inputs: Record<string, string>): void {
    const missing = template.variables.filter((name) => {
      const value = inputs[name];
      return typeof value !== 'string' || value.trim().length === 0;
    });
    if (missing.length > 0) {
      throw new TemplateInputError(`Missing template inputs: ${missing.join(', ')}`, missing);
    }
  }

  async generate(role: DocumentRole, templateId: string, inputs: Record<string, string>): Promise<string> {
    const { template } = this.catalog.resolve(role, templateId);
    this.validateInputs(template, inputs);

    let raw: string;
    try {
      raw = await this.generator.complete(buildPrompt(template, inputs));
    } catch (err) {
      if (err instanceof AppError) throw err;
      const error = toError(err);
      throw new GenerationUnavailable(`${this.generator.provider} generation failed: ${error.message}`, error);
    }

    const content = normalizeContent(raw);
    if (content.length === 0) {
      throw new GenerationUnavailable(`${this.generator.provider} returned an empty completion`);
    }
    return content;
  }
}
