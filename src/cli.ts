#!/usr/bin/env tsx
// facetrail CLI entry point

import { access } from "fs/promises";
import { loadConfig, resolveIndexPath } from "./config";
import { loadPlatformCatalog, type PlatformCatalog } from "./config/platforms";
import { CrawlOrchestrator } from "./crawler/orchestrator";
import { ImageFetcher } from "./crawler/image-fetcher";
import { createEmbeddingProvider } from "./embedding";
import { FaceIndex } from "./storage/face-index";
import { IndexingPipeline } from "./pipeline/indexing";
import { FaceMatcher } from "./pipeline/matcher";
import type { FaceEmbeddingProvider, FacetrailConfig, MatchResult } from "./types";

interface ParsedArgs {
  positional: string[];
  flags: Map<string, string | true>;
}

function parseArgs(argv: string[]): ParsedArgs {
  const positional: string[] = [];
  const flags = new Map<string, string | true>();

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i]!;
    if (!arg.startsWith("--")) {
      positional.push(arg);
      continue;
    }

    const [name, inline] = arg.slice(2).split("=", 2);
    if (!name) continue;
    if (inline !== undefined) {
      flags.set(name, inline);
    } else if (argv[i + 1] !== undefined && !argv[i + 1]!.startsWith("--") && !name.startsWith("no-") && name !== "save") {
      flags.set(name, argv[++i]!);
    } else {
      flags.set(name, true);
    }
  }

  return { positional, flags };
}

function stringFlag(args: ParsedArgs, name: string): string | undefined {
  const value = args.flags.get(name);
  return typeof value === "string" ? value : undefined;
}

function numberFlag(args: ParsedArgs, name: string, fallback: number): number {
  const value = stringFlag(args, name);
  if (value === undefined) return fallback;
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) {
    console.error(`--${name} expects a number, got "${value}"`);
    process.exit(1);
  }
  return parsed;
}

function splitList(value: string): string[] {
  return value.split(",").map(s => s.trim()).filter(Boolean);
}

interface Context {
  config: FacetrailConfig;
  catalog: PlatformCatalog;
  index: FaceIndex;
  indexPath: string;
  images: ImageFetcher;
  embedding: FaceEmbeddingProvider;
}

async function fileExists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

async function createContext(): Promise<Context> {
  const config = await loadConfig();
  const catalog = await loadPlatformCatalog(config.platformsFile);
  const embedding = await createEmbeddingProvider(config.embedding);
  const indexPath = resolveIndexPath(config);
  const index = new FaceIndex({ metric: embedding.metric, path: indexPath });

  if (await fileExists(indexPath)) {
    await index.restore();
  }

  const images = new ImageFetcher({
    maxBytes: config.images.maxBytes,
    timeout: config.images.timeout,
    userAgent: config.crawler.userAgents[0],
  });

  return { config, catalog, index, indexPath, images, embedding };
}

function createPipeline(ctx: Context): IndexingPipeline {
  return new IndexingPipeline({
    images: ctx.images,
    embedding: ctx.embedding,
    index: ctx.index,
    perProfile: ctx.config.images.perProfile,
    verbose: ctx.config.crawler.verbose,
  });
}

function printMatches(matches: MatchResult[]): void {
  if (matches.length === 0) {
    console.log("No faces in the index to compare against.");
    return;
  }

  matches.forEach((match, i) => {
    const verdict = match.isMatch ? "MATCH" : "no match";
    console.log(`\n${i + 1}. ${match.username} on ${match.platformId} (${verdict})`);
    console.log(`   Distance: ${match.distance.toFixed(4)}  Similarity: ${(match.similarity * 100).toFixed(1)}%`);
    if (match.pageUrl) console.log(`   Profile: ${match.pageUrl}`);
    console.log(`   Image: ${match.imageUrl}`);
  });
}

function printUsage(): void {
  console.log("facetrail - Username probing and face index");
  console.log("");
  console.log("Usage: facetrail <command> [options]");
  console.log("");
  console.log("Commands:");
  console.log("  crawl <user[,user...]> [--platforms a,b] [--no-index] [--save]");
  console.log("                                  Probe platforms and index found faces");
  console.log("  probe <username> <platform>     Probe a single platform");
  console.log("  search <image> [--threshold n] [--top n]");
  console.log("                                  Find indexed faces similar to an image");
  console.log("  compare <imageA> <imageB> [--threshold n]");
  console.log("                                  Compare two images directly");
  console.log("  add <username> <platform> <image> [--page url]");
  console.log("                                  Add a face to the index by hand");
  console.log("  stats                           Show index statistics");
  console.log("  clear                           Remove every face from the index");
  console.log("  platforms                       List configured platforms");
  console.log("");
  console.log("Images may be a local path, an http(s) URL or a data URI.");
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  const command = args.positional[0];

  switch (command) {
    case "crawl": {
      const usernames = splitList(args.positional.slice(1).join(","));
      if (usernames.length === 0) {
        console.error("Usage: facetrail crawl <user[,user...]> [--platforms a,b] [--no-index] [--save]");
        process.exit(1);
      }

      const ctx = await createContext();
      const platformsFlag = stringFlag(args, "platforms");
      const platformIds = platformsFlag ? splitList(platformsFlag) : undefined;

      const orchestrator = CrawlOrchestrator.fromConfig(ctx.config.crawler, ctx.catalog);
      const results = await orchestrator.crawl(usernames, platformIds);

      console.log("\nProfiles found:");
      for (const [username, probes] of results) {
        const found = probes.filter(p => p.exists);
        console.log(`  ${username}: ${found.length}/${probes.length}`);
        for (const probe of found) {
          console.log(`    ${probe.platformId}: ${probe.finalUrl} (${probe.candidateImageUrls.length} image(s))`);
        }
      }

      if (args.flags.has("no-index")) break;

      const report = await createPipeline(ctx).indexWithReport(results);
      const failed = report.attempts.filter(a => a.error);
      console.log(`\nIndexed ${report.records.length} face(s) from ${report.attempts.length} image(s); ${failed.length} failed`);
      for (const attempt of failed) {
        console.log(`  ${attempt.username}@${attempt.platformId}: ${attempt.error?.kind} (${attempt.imageUrl})`);
      }

      if (args.flags.has("save")) {
        await ctx.index.persist();
      } else if (report.records.length > 0) {
        console.log("Index not saved (pass --save to write it).");
      }
      break;
    }

    case "probe": {
      const [, username, platformId] = args.positional;
      if (!username || !platformId) {
        console.error("Usage: facetrail probe <username> <platform>");
        process.exit(1);
      }

      const ctx = await createContext();
      const orchestrator = CrawlOrchestrator.fromConfig({ ...ctx.config.crawler, verbose: false }, ctx.catalog);
      const results = await orchestrator.crawl([username], [platformId]);
      const result = results.get(username.trim())?.[0];
      if (!result) {
        console.error(`No probe ran for ${platformId}; check the platform id with "facetrail platforms".`);
        process.exit(1);
      }

      console.log(`Platform: ${result.platformId}`);
      console.log(`URL: ${result.finalUrl}`);
      console.log(`Status: ${result.statusCode}`);
      console.log(`Exists: ${result.exists}`);
      if (result.error) console.log(`Error: ${result.error.kind} - ${result.error.message}`);
      for (const url of result.candidateImageUrls) {
        console.log(`  image: ${url}`);
      }
      break;
    }

    case "search": {
      const image = args.positional[1];
      if (!image) {
        console.error("Usage: facetrail search <image> [--threshold n] [--top n]");
        process.exit(1);
      }

      const ctx = await createContext();
      const matcher = new FaceMatcher(ctx.images, ctx.embedding, ctx.index);
      const outcome = await matcher.matchImage(image, {
        threshold: numberFlag(args, "threshold", ctx.config.index.threshold),
        topK: numberFlag(args, "top", ctx.config.index.topK),
      });

      if (!outcome.ok) {
        console.error(`Search failed: ${outcome.error.kind} - ${outcome.error.message}`);
        process.exit(1);
      }
      printMatches(outcome.matches);
      break;
    }

    case "compare": {
      const [, first, second] = args.positional;
      if (!first || !second) {
        console.error("Usage: facetrail compare <imageA> <imageB> [--threshold n]");
        process.exit(1);
      }

      const ctx = await createContext();
      const matcher = new FaceMatcher(ctx.images, ctx.embedding, ctx.index);
      const outcome = await matcher.compare(first, second, numberFlag(args, "threshold", ctx.config.index.threshold));

      if (!outcome.ok) {
        console.error(`Compare failed on the ${outcome.image} image: ${outcome.error.kind} - ${outcome.error.message}`);
        process.exit(1);
      }
      console.log(`Distance: ${outcome.distance.toFixed(4)}`);
      console.log(`Similarity: ${(outcome.similarity * 100).toFixed(1)}%`);
      console.log(outcome.isMatch ? "Same person (match)" : "Different people (no match)");
      break;
    }

    case "add": {
      const [, username, platformId, image] = args.positional;
      if (!username || !platformId || !image) {
        console.error("Usage: facetrail add <username> <platform> <image> [--page url]");
        process.exit(1);
      }

      const ctx = await createContext();
      const attempt = await createPipeline(ctx).addManual({
        username,
        platformId,
        imageSource: image,
        pageUrl: stringFlag(args, "page"),
      });

      if (attempt.error) {
        console.error(`Could not add face: ${attempt.error.kind} - ${attempt.error.message}`);
        process.exit(1);
      }
      await ctx.index.persist();
      console.log(`Added face ${attempt.recordId} for ${username}@${platformId}`);
      break;
    }

    case "stats": {
      const ctx = await createContext();
      const stats = ctx.index.stats();
      console.log(`Index: ${ctx.indexPath}`);
      console.log(`Faces: ${stats.total}`);
      console.log(`Dimensions: ${stats.dimensions}`);
      console.log(`Metric: ${ctx.index.metric}`);
      if (stats.total > 0) {
        console.log("\nBy platform:");
        for (const [platform, count] of Object.entries(stats.byPlatform)) {
          console.log(`  ${platform}: ${count}`);
        }
        console.log("\nBy username:");
        for (const [username, count] of Object.entries(stats.byUsername)) {
          console.log(`  ${username}: ${count}`);
        }
      }
      break;
    }

    case "clear": {
      const ctx = await createContext();
      const removed = ctx.index.size;
      ctx.index.clear();
      await ctx.index.persist();
      console.log(`Removed ${removed} face(s).`);
      break;
    }

    case "platforms": {
      const config = await loadConfig();
      const catalog = await loadPlatformCatalog(config.platformsFile);
      for (const template of catalog.list()) {
        const state = template.enabled ? "" : " (disabled)";
        console.log(`${template.id.padEnd(16)} ${template.existenceStrategy.padEnd(14)} ${template.urlPattern}${state}`);
      }
      break;
    }

    default:
      printUsage();
  }
}

main().catch(err => {
  console.error(err instanceof Error ? err.message : err);
  process.exit(1);
});
