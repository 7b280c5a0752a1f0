import { Injectable } from '@nestjs/common';
import { TemplateInputError, UnknownRoleError } from '@contractflow/shared';
import { DocumentRole, isDocumentRole } from '../domain/document';
import { CONTRACT_TEMPLATES, ContractTemplate } from './contract-templates';

/**
 * Lookup table from the closed role set to the templates each role may use.
 * The first template registered for a role is its default.
 */
@Injectable()
export class TemplateCatalog {
  private readonly byId = new Map<string, ContractTemplate>();

  constructor(templates: ContractTemplate[] = CONTRACT_TEMPLATES) {
    for (const template of templates) {
      this.byId.set(template.id, template);
    }
  }

  get(templateId: string): ContractTemplate {
    const template = this.byId.get(templateId);
    if (!template) {
      throw new TemplateInputError(`Unknown template: ${templateId}`);
    }
    return template;
  }

  forRole(role: DocumentRole): ContractTemplate[] {
    return Array.from(this.byId.values()).filter((t) => t.role === role);
  }

  resolve(role: string, templateId?: string): { role: DocumentRole; template: ContractTemplate } {
    if (!isDocumentRole(role)) {
      throw new UnknownRoleError(role);
    }

    if (!templateId) {
      const [fallback] = this.forRole(role);
      if (!fallback) {
        throw new TemplateInputError(`No template registered for role ${role}`);
      }
      return { role, template: fallback };
    }

    const template = this.get(templateId);
    if (template.role !== role) {
      throw new TemplateInputError(`Template ${templateId} is not available for role ${role}`);
    }
    return { role, template };
  }
}
