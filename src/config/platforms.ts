// Platform template loading and validation

import { readFile } from "fs/promises";
import { z } from "zod/v4";
import type { PlatformTemplate, ProbeRequest } from "../types";
import bundledPlatforms from "../data/platforms.json";

export const USERNAME_PLACEHOLDER = "{}";

const TemplateEntrySchema = z.union([
  z.string(),
  z.object({
    url: z.string(),
    existence_strategy: z.string().min(1).optional(),
    avatar_selector: z.string().optional(),
    enabled: z.boolean().optional(),
  }).strict(),
]);

const TemplateFileSchema = z.record(z.string().min(1, "platform id cannot be empty"), TemplateEntrySchema);

export class PlatformConfigError extends Error {
  constructor(
    message: string,
    public readonly details: string[]
  ) {
    super(message);
    this.name = "PlatformConfigError";
  }
}

function countPlaceholders(pattern: string): number {
  return pattern.split(USERNAME_PLACEHOLDER).length - 1;
}

function checkUrlPattern(id: string, pattern: string): string | null {
  const count = countPlaceholders(pattern);
  if (count !== 1) {
    return `${id}: url must contain exactly one "${USERNAME_PLACEHOLDER}" placeholder (found ${count})`;
  }

  try {
    const url = new URL(pattern.replace(USERNAME_PLACEHOLDER, "username"));
    if (url.protocol !== "http:" && url.protocol !== "https:") {
      return `${id}: url must use http or https`;
    }
  } catch {
    return `${id}: url is not a valid URL`;
  }

  return null;
}

/**
 * Parse a template file body of the form
 * `{ "<id>": "https://host/{}" }` or
 * `{ "<id>": { "url": ..., "existence_strategy": ..., "avatar_selector": ..., "enabled": ... } }`.
 * Throws PlatformConfigError listing every problem found.
 */
export function parsePlatformTemplates(raw: unknown, origin = "(inline)"): PlatformTemplate[] {
  const result = TemplateFileSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues.map(issue => {
      const path = issue.path.join(".");
      return path ? `${path}: ${issue.message}` : issue.message;
    });
    throw new PlatformConfigError(`Invalid platform templates in ${origin}:\n${details.map(d => `  - ${d}`).join("\n")}`, details);
  }

  const templates: PlatformTemplate[] = [];
  const details: string[] = [];

  for (const [id, entry] of Object.entries(result.data)) {
    const template: PlatformTemplate = typeof entry === "string"
      ? { id, urlPattern: entry, existenceStrategy: "universal", enabled: true }
      : {
          id,
          urlPattern: entry.url,
          existenceStrategy: entry.existence_strategy ?? "universal",
          avatarSelector: entry.avatar_selector || undefined,
          enabled: entry.enabled ?? true,
        };

    const problem = checkUrlPattern(id, template.urlPattern);
    if (problem) {
      details.push(problem);
      continue;
    }
    templates.push(template);
  }

  if (details.length > 0) {
    throw new PlatformConfigError(`Invalid platform templates in ${origin}:\n${details.map(d => `  - ${d}`).join("\n")}`, details);
  }

  return templates;
}

/**
 * Immutable, validated set of platform templates for one run.
 */
export class PlatformCatalog {
  private templates: Map<string, PlatformTemplate>;

  constructor(templates: PlatformTemplate[]) {
    this.templates = new Map();
    for (const template of templates) {
      if (this.templates.has(template.id)) {
        throw new PlatformConfigError(`Duplicate platform id: ${template.id}`, [`${template.id}: duplicate id`]);
      }
      const problem = checkUrlPattern(template.id, template.urlPattern);
      if (problem) {
        throw new PlatformConfigError(`Invalid platform template ${problem}`, [problem]);
      }
      this.templates.set(template.id, Object.freeze({ ...template }));
    }
  }

  get(id: string): PlatformTemplate | undefined {
    return this.templates.get(id);
  }

  has(id: string): boolean {
    return this.templates.has(id);
  }

  list(): PlatformTemplate[] {
    return Array.from(this.templates.values());
  }

  enabled(): PlatformTemplate[] {
    return this.list().filter(t => t.enabled);
  }

  ids(): string[] {
    return Array.from(this.templates.keys());
  }

  get size(): number {
    return this.templates.size;
  }

  buildRequest(template: PlatformTemplate, username: string): ProbeRequest {
    return {
      username,
      platformId: template.id,
      url: resolveProfileUrl(template, username),
    };
  }
}

export function resolveProfileUrl(template: PlatformTemplate, username: string): string {
  return template.urlPattern.replace(USERNAME_PLACEHOLDER, encodeURIComponent(username));
}

export function loadBundledPlatforms(): PlatformCatalog {
  return new PlatformCatalog(parsePlatformTemplates(bundledPlatforms, "bundled platforms.json"));
}

export async function loadPlatformCatalog(path?: string): Promise<PlatformCatalog> {
  if (!path) {
    return loadBundledPlatforms();
  }

  const content = await readFile(path, "utf-8");
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new PlatformConfigError(`Invalid JSON in ${path}: ${message}`, [message]);
  }

  return new PlatformCatalog(parsePlatformTemplates(raw, path));
}
