// Existence strategies: decide from a probe response whether a profile exists

import { parseHTML } from "linkedom";
import { z } from "zod/v4";
import bundledStrategies from "../data/strategies.json";
import avatarPatterns from "../data/avatar-patterns.json";
import genericNotFound from "../data/not-found-phrases.json";

export interface StrategyResponse {
  finalUrl: string;
  statusCode: number;
  body: string;
}

export type ExistenceStrategy = (response: StrategyResponse, username: string) => boolean;

export const FALLBACK_STRATEGY_ID = "universal";

const GENERIC_NOT_FOUND: readonly string[] = genericNotFound;

const StatusCodeSchema = z.object({
  kind: z.literal("status_code"),
});

const MarkersSchema = z.object({
  kind: z.literal("markers"),
  notFound: z.array(z.string().min(1)).default([]),
  profile: z.array(z.string().min(1)).default([]),
  profileNeedsUsername: z.boolean().default(false),
  usernameInTitle: z.boolean().default(false),
  avatarHosts: z.array(z.string().min(1)).default([]),
  fallback: z.boolean().default(true),
});

const RedirectSchema = z.object({
  kind: z.literal("redirect"),
  rejectUrls: z.array(z.string().min(1)).default([]),
  notFound: z.array(z.string().min(1)).default([]),
});

const StrategyDefinitionSchema = z.discriminatedUnion("kind", [StatusCodeSchema, MarkersSchema, RedirectSchema]);

const StrategyFileSchema = z.record(z.string().min(1), StrategyDefinitionSchema);

export type StatusCodeDefinition = z.infer<typeof StatusCodeSchema>;
export type MarkersDefinition = z.infer<typeof MarkersSchema>;
export type RedirectDefinition = z.infer<typeof RedirectSchema>;
export type StrategyDefinition = z.infer<typeof StrategyDefinitionSchema>;

export class StrategyDefinitionError extends Error {
  constructor(
    message: string,
    public readonly details: string[]
  ) {
    super(message);
    this.name = "StrategyDefinitionError";
  }
}

export function parseStrategyDefinitions(raw: unknown, origin = "(inline)"): Record<string, StrategyDefinition> {
  const result = StrategyFileSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues.map(issue => {
      const path = issue.path.join(".");
      return path ? `${path}: ${issue.message}` : issue.message;
    });
    throw new StrategyDefinitionError(`Invalid strategy definitions in ${origin}:\n${details.map(d => `  - ${d}`).join("\n")}`, details);
  }
  return result.data;
}

/** Lowercases the body and folds the common apostrophe encodings to "'" */
function normalizeBody(body: string): string {
  return body
    .toLowerCase()
    .replace(/&#0*39;|&#x0*27;|&apos;|’/g, "'");
}

function containsAny(haystack: string, needles: readonly string[]): boolean {
  return needles.some(needle => haystack.includes(needle.toLowerCase()));
}

interface ImageLike {
  getAttribute(name: string): string | null;
}

function pageTitle(body: string): string {
  const { document } = parseHTML(body);
  return (document.querySelector("title")?.textContent ?? "").toLowerCase();
}

function hasAvatarFromHost(body: string, hosts: readonly string[]): boolean {
  const { document } = parseHTML(body);
  const images: ImageLike[] = Array.from(document.querySelectorAll("img"));
  return images.some(img => {
    const src = (img.getAttribute("src") ?? "").toLowerCase();
    if (!src || !containsAny(src, hosts)) return false;
    return !avatarPatterns.placeholderTokens.some(token => src.includes(token));
  });
}

function statusCodeStrategy(): ExistenceStrategy {
  return response => response.statusCode === 200;
}

function universalStrategy(): ExistenceStrategy {
  return response => response.statusCode === 200 && !containsAny(normalizeBody(response.body), GENERIC_NOT_FOUND);
}

function markersStrategy(def: MarkersDefinition): ExistenceStrategy {
  return (response, username) => {
    if (response.statusCode !== 200) return false;

    const body = normalizeBody(response.body);
    const name = username.toLowerCase();

    if (containsAny(body, def.notFound)) return false;

    if (containsAny(body, def.profile) && (!def.profileNeedsUsername || body.includes(name))) {
      return true;
    }

    if (def.usernameInTitle && name && pageTitle(response.body).includes(name)) {
      return true;
    }

    if (def.avatarHosts.length > 0 && hasAvatarFromHost(response.body, def.avatarHosts)) {
      return true;
    }

    return def.fallback;
  };
}

function redirectStrategy(def: RedirectDefinition): ExistenceStrategy {
  return response => {
    if (response.statusCode === 404) return false;
    if (containsAny(response.finalUrl.toLowerCase(), def.rejectUrls)) return false;
    if (containsAny(normalizeBody(response.body), def.notFound)) return false;
    // 3xx left after redirects, 403 and 429 all mean the profile route answered
    return true;
  };
}

export function compileStrategy(def: StrategyDefinition): ExistenceStrategy {
  switch (def.kind) {
    case "status_code":
      return statusCodeStrategy();
    case "markers":
      return markersStrategy(def);
    case "redirect":
      return redirectStrategy(def);
  }
}

/**
 * Strategy id -> compiled strategy. Always holds "status_code" and "universal";
 * lookups for unknown ids resolve to "universal".
 */
export class ExistenceStrategyRegistry {
  private strategies = new Map<string, ExistenceStrategy>();

  constructor(definitions: Record<string, StrategyDefinition> = {}) {
    this.strategies.set("status_code", statusCodeStrategy());
    this.strategies.set(FALLBACK_STRATEGY_ID, universalStrategy());
    for (const [id, def] of Object.entries(definitions)) {
      this.register(id, def);
    }
  }

  register(id: string, definition: StrategyDefinition | ExistenceStrategy): void {
    this.strategies.set(id, typeof definition === "function" ? definition : compileStrategy(definition));
  }

  has(id: string): boolean {
    return this.strategies.has(id);
  }

  ids(): string[] {
    return Array.from(this.strategies.keys());
  }

  get(id: string | undefined): ExistenceStrategy {
    const strategy = id ? this.strategies.get(id) : undefined;
    return strategy ?? this.fallback();
  }

  /** Runs the strategy; any internal failure counts as "does not exist" */
  evaluate(id: string | undefined, response: StrategyResponse, username: string): boolean {
    try {
      return this.get(id)(response, username);
    } catch (err) {
      console.warn(`[strategy] ${id ?? FALLBACK_STRATEGY_ID} failed for ${response.finalUrl}:`, err);
      return false;
    }
  }

  private fallback(): ExistenceStrategy {
    const universal = this.strategies.get(FALLBACK_STRATEGY_ID);
    return universal ?? universalStrategy();
  }
}

export function createDefaultStrategyRegistry(): ExistenceStrategyRegistry {
  return new ExistenceStrategyRegistry(parseStrategyDefinitions(bundledStrategies, "bundled strategies.json"));
}
