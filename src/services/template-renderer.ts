import * as fs from 'fs/promises';
import Handlebars from 'handlebars';
import { Type } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { createLogger } from '../config/logger';
import { TemplateError, errorMessage } from '../errors';

const log = createLogger('template-renderer');

export interface RenderedTemplate {
  subject: string;
  body: string;
}

export interface TemplateRenderer {
  render(templateId: string, data: Readonly<Record<string, unknown>>): Promise<RenderedTemplate>;
}

export interface TemplateSource {
  subject: string;
  body: string;
}

const TemplateFileSchema = Type.Record(
  Type.String(),
  Type.Object({ subject: Type.String(), body: Type.String() })
);

interface CompiledTemplate {
  subject: Handlebars.TemplateDelegate;
  body: Handlebars.TemplateDelegate;
}

/**
 * Handlebars-backed renderer. Templates compile in strict mode, so a
 * template that references missing data fails instead of rendering blanks.
 */
export class HandlebarsTemplateRenderer implements TemplateRenderer {
  private readonly handlebars = Handlebars.create();
  private readonly templates = new Map<string, CompiledTemplate>();

  constructor(templates: Record<string, TemplateSource> = {}) {
    this.registerHelpers();
    for (const [id, source] of Object.entries(templates)) {
      this.register(id, source);
    }
  }

  register(templateId: string, source: TemplateSource): void {
    this.templates.set(templateId, {
      subject: this.handlebars.compile(source.subject, { strict: true, noEscape: true }),
      body: this.handlebars.compile(source.body, { strict: true, noEscape: true }),
    });
  }

  has(templateId: string): boolean {
    return this.templates.has(templateId);
  }

  async render(templateId: string, data: Readonly<Record<string, unknown>>): Promise<RenderedTemplate> {
    const template = this.templates.get(templateId);
    if (!template) {
      throw new TemplateError(templateId, 'template not found');
    }
    try {
      return { subject: template.subject(data), body: template.body(data) };
    } catch (error) {
      throw new TemplateError(templateId, errorMessage(error));
    }
  }

  /** Load a JSON file mapping template ids to {subject, body} sources */
  async loadFromFile(filePath: string): Promise<number> {
    const raw: unknown = JSON.parse(await fs.readFile(filePath, 'utf-8'));
    if (!Value.Check(TemplateFileSchema, raw)) {
      throw new TemplateError(filePath, 'template file must map ids to {subject, body}');
    }
    for (const [id, source] of Object.entries(raw)) {
      this.register(id, source);
    }
    log.info('Templates loaded', { file: filePath, count: Object.keys(raw).length });
    return Object.keys(raw).length;
  }

  private registerHelpers(): void {
    this.handlebars.registerHelper('formatDate', (value: unknown) => {
      const date = value instanceof Date ? value : new Date(String(value));
      return isNaN(date.getTime()) ? String(value) : date.toISOString().slice(0, 10);
    });

    this.handlebars.registerHelper('formatNumber', (value: unknown, digits: unknown) => {
      const decimals = typeof digits === 'number' ? digits : 2;
      return typeof value === 'number' ? value.toFixed(decimals) : String(value);
    });

    this.handlebars.registerHelper('formatPercent', (value: unknown) => {
      return typeof value === 'number' ? `${(value * 100).toFixed(2)}%` : String(value);
    });

    this.handlebars.registerHelper('upper', (value: unknown) => String(value).toUpperCase());
    this.handlebars.registerHelper('eq', (a: unknown, b: unknown) => a === b);
  }
}
