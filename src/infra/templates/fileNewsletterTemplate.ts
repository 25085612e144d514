import { readFile } from "node:fs/promises";
import path from "node:path";
import type {
  NewsletterContent,
  NewsletterContentPort,
} from "../../core/ports/outboundPorts";

export const DEFAULT_TEMPLATE_PATH = path.resolve(
  __dirname,
  "../../../templates/weekly-newsletter.html",
);

const escapeHtml = (value: string): string =>
  value
    .replaceAll("&", "&amp;")
    .replaceAll("<", "&lt;")
    .replaceAll(">", "&gt;")
    .replaceAll('"', "&quot;")
    .replaceAll("'", "&#39;");

/**
 * Fills `{{name}}` placeholders with escaped values; unknown placeholders are left as written.
 */
export const fillTemplate = (
  template: string,
  values: Record<string, string>,
): string =>
  template.replace(/\{\{\s*(\w+)\s*\}\}/g, (placeholder, key: string) => {
    const value = values[key];
    return value === undefined ? placeholder : escapeHtml(value);
  });

/**
 * Renders the weekly newsletter from an HTML file on disk.
 */
export class FileNewsletterTemplate implements NewsletterContentPort {
  constructor(
    private readonly subject: string,
    private readonly siteUrl: string,
    private readonly templatePath = DEFAULT_TEMPLATE_PATH,
  ) {}

  async render(): Promise<NewsletterContent> {
    const template = await readFile(this.templatePath, "utf8");
    const unsubscribeUrl = new URL("/unsubscribe", this.siteUrl).toString();

    return {
      subject: this.subject,
      html: fillTemplate(template, {
        title: this.subject,
        siteUrl: this.siteUrl,
        unsubscribeUrl,
      }),
    };
  }
}
