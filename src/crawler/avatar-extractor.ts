// Avatar candidate extraction from profile pages

import { parseHTML } from "linkedom";
import avatarPatterns from "../data/avatar-patterns.json";

type HtmlDocument = ReturnType<typeof parseHTML>["document"];

interface ElementLike {
  getAttribute(name: string): string | null;
}

export type PhaseId = "selector" | "attributes" | "meta" | "filename" | "url_pattern" | "fallback";

export const DEFAULT_PHASE_ORDER: readonly PhaseId[] = [
  "selector",
  "attributes",
  "meta",
  "filename",
  "url_pattern",
  "fallback",
];

/** Phases that contribute even when earlier phases already found candidates */
const UNION_PHASES: ReadonlySet<PhaseId> = new Set(["meta"]);

const META_SELECTORS = [
  'meta[property="og:image"]',
  'meta[name="og:image"]',
  'meta[name="twitter:image"]',
  'meta[property="twitter:image"]',
  'meta[itemprop="image"]',
];

const SOURCE_ATTRIBUTES = ["src", "data-src", "data-original", "data-lazy-src"];

export interface ExtractionHint {
  /** Platform-declared CSS selector for the avatar */
  selector?: string;
}

export interface AvatarExtractorOptions {
  maxCandidates?: number;
  /** Declared width/height below this rejects a candidate */
  minDimension?: number;
  /** Both declared dimensions must reach this in the fallback phase */
  fallbackMinDimension?: number;
  phaseOrder?: readonly PhaseId[];
  vocabulary?: readonly string[];
  placeholderTokens?: readonly string[];
  urlPatterns?: readonly (string | RegExp)[];
}

interface Candidate {
  url: string;
  element: ElementLike | null;
}

interface PhaseContext {
  document: HtmlDocument;
  baseUrl: string;
  hint: ExtractionHint;
}

type Phase = (ctx: PhaseContext) => Candidate[];

export class AvatarExtractor {
  private maxCandidates: number;
  private minDimension: number;
  private fallbackMinDimension: number;
  private phaseOrder: readonly PhaseId[];
  private vocabulary: readonly string[];
  private placeholderTokens: readonly string[];
  private urlPatterns: RegExp[];
  private phases: Record<PhaseId, Phase>;

  constructor(options: AvatarExtractorOptions = {}) {
    this.maxCandidates = options.maxCandidates ?? 10;
    this.minDimension = options.minDimension ?? 32;
    this.fallbackMinDimension = options.fallbackMinDimension ?? 64;
    this.phaseOrder = options.phaseOrder ?? DEFAULT_PHASE_ORDER;
    this.vocabulary = (options.vocabulary ?? avatarPatterns.vocabulary).map(w => w.toLowerCase());
    this.placeholderTokens = (options.placeholderTokens ?? avatarPatterns.placeholderTokens).map(t => t.toLowerCase());
    this.urlPatterns = (options.urlPatterns ?? avatarPatterns.avatarUrlPatterns).map(p =>
      typeof p === "string" ? new RegExp(p, "i") : p
    );

    this.phases = {
      selector: ctx => this.selectorPhase(ctx),
      attributes: ctx => this.attributesPhase(ctx),
      meta: ctx => this.metaPhase(ctx),
      filename: ctx => this.filenamePhase(ctx),
      url_pattern: ctx => this.urlPatternPhase(ctx),
      fallback: ctx => this.fallbackPhase(ctx),
    };
  }

  /**
   * Candidate avatar URLs in document order, most likely first.
   * Identical input always yields identical output.
   */
  extract(html: string, baseUrl: string, hint: ExtractionHint = {}): string[] {
    if (!html) return [];

    const { document } = parseHTML(html);
    const ctx: PhaseContext = { document, baseUrl, hint };
    const accepted: string[] = [];
    const seen = new Set<string>();

    for (const phaseId of this.phaseOrder) {
      if (accepted.length > 0 && !UNION_PHASES.has(phaseId)) continue;

      for (const candidate of this.phases[phaseId](ctx)) {
        if (!this.isValid(candidate)) continue;
        const key = dedupeKey(candidate.url);
        if (seen.has(key)) continue;
        seen.add(key);
        accepted.push(candidate.url);
      }
    }

    return accepted.slice(0, this.maxCandidates);
  }

  private selectorPhase({ document, baseUrl, hint }: PhaseContext): Candidate[] {
    if (!hint.selector) return [];

    let matched: ElementLike[];
    try {
      matched = Array.from(document.querySelectorAll(hint.selector));
    } catch (err) {
      console.warn(`[extract] Invalid avatar selector "${hint.selector}":`, err);
      return [];
    }

    const candidates: Candidate[] = [];
    for (const element of matched) {
      const src = imageSource(element) ?? element.getAttribute("content");
      const url = src ? absolutize(src, baseUrl) : null;
      if (url) candidates.push({ url, element });
    }
    return candidates;
  }

  private attributesPhase({ document, baseUrl }: PhaseContext): Candidate[] {
    return this.imageCandidates(document, baseUrl).filter(({ element }) => {
      const text = ["class", "id", "alt", "title"]
        .map(name => element.getAttribute(name) ?? "")
        .join(" ")
        .toLowerCase();
      return this.mentionsVocabulary(text);
    });
  }

  private metaPhase({ document, baseUrl }: PhaseContext): Candidate[] {
    const candidates: Candidate[] = [];
    for (const selector of META_SELECTORS) {
      const metas: ElementLike[] = Array.from(document.querySelectorAll(selector));
      for (const meta of metas) {
        const content = meta.getAttribute("content")?.trim();
        const url = content ? absolutize(content, baseUrl) : null;
        // meta tags carry no presentational attributes worth filtering on
        if (url) candidates.push({ url, element: null });
      }
    }
    return candidates;
  }

  private filenamePhase({ document, baseUrl }: PhaseContext): Candidate[] {
    return this.imageCandidates(document, baseUrl).filter(({ url }) => {
      const segment = new URL(url).pathname.split("/").filter(Boolean).pop() ?? "";
      return this.mentionsVocabulary(segment.toLowerCase());
    });
  }

  private urlPatternPhase({ document, baseUrl }: PhaseContext): Candidate[] {
    return this.imageCandidates(document, baseUrl).filter(({ url }) =>
      this.urlPatterns.some(pattern => pattern.test(url))
    );
  }

  private fallbackPhase({ document, baseUrl }: PhaseContext): Candidate[] {
    const candidates: Candidate[] = [];
    for (const candidate of this.imageCandidates(document, baseUrl)) {
      const width = declaredDimension(candidate.element, "width");
      const height = declaredDimension(candidate.element, "height");
      const undeclared = width === null && height === null;
      const bigEnough = width !== null && height !== null &&
        width >= this.fallbackMinDimension && height >= this.fallbackMinDimension;
      if (undeclared || bigEnough) candidates.push(candidate);
    }
    return candidates;
  }

  private imageCandidates(document: HtmlDocument, baseUrl: string): { url: string; element: ElementLike }[] {
    const images: ElementLike[] = Array.from(document.querySelectorAll("img"));
    const candidates: { url: string; element: ElementLike }[] = [];
    for (const element of images) {
      const src = imageSource(element);
      const url = src ? absolutize(src, baseUrl) : null;
      if (url) candidates.push({ url, element });
    }
    return candidates;
  }

  private mentionsVocabulary(text: string): boolean {
    return this.vocabulary.some(word => text.includes(word));
  }

  private isValid({ url, element }: Candidate): boolean {
    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch {
      return false;
    }
    if (parsed.protocol !== "http:" && parsed.protocol !== "https:") return false;

    const texts = [url.toLowerCase()];
    if (element) {
      texts.push((element.getAttribute("alt") ?? "").toLowerCase());
      texts.push((element.getAttribute("title") ?? "").toLowerCase());
    }
    if (this.placeholderTokens.some(token => texts.some(text => text.includes(token)))) {
      return false;
    }

    if (element) {
      const width = declaredDimension(element, "width");
      const height = declaredDimension(element, "height");
      if ((width !== null && width < this.minDimension) || (height !== null && height < this.minDimension)) {
        return false;
      }
    }

    return true;
  }
}

/** First usable source attribute, then the first srcset entry */
function imageSource(element: ElementLike): string | null {
  for (const attr of SOURCE_ATTRIBUTES) {
    const value = element.getAttribute(attr)?.trim();
    if (value) return value;
  }

  const srcset = element.getAttribute("srcset")?.trim();
  if (srcset) {
    const first = srcset.split(",")[0]?.trim().split(/\s+/)[0];
    if (first) return first;
  }

  return null;
}

function absolutize(src: string, baseUrl: string): string | null {
  try {
    return new URL(src, baseUrl).href;
  } catch {
    return null;
  }
}

function declaredDimension(element: ElementLike, name: "width" | "height"): number | null {
  const raw = element.getAttribute(name);
  if (!raw) return null;
  const value = parseInt(raw, 10);
  return Number.isFinite(value) ? value : null;
}

function dedupeKey(url: string): string {
  const parsed = new URL(url);
  return `${parsed.protocol}//${parsed.host}${parsed.pathname}`;
}
