import { describe, test, expect, vi, afterEach } from "vitest";
import {
  ExistenceStrategyRegistry,
  StrategyDefinitionError,
  createDefaultStrategyRegistry,
  parseStrategyDefinitions,
} from "../src/crawler/strategies";
import notFoundPhrases from "../src/data/not-found-phrases.json";

function response(statusCode: number, body = "", finalUrl = "https://e.test/alice") {
  return { finalUrl, statusCode, body };
}

describe("built-in strategies", () => {
  const registry = new ExistenceStrategyRegistry();

  test("status_code should count only 200 as existing", () => {
    const strategy = registry.get("status_code");
    expect(strategy(response(200), "alice")).toBe(true);
    expect(strategy(response(404), "alice")).toBe(false);
    expect(strategy(response(302), "alice")).toBe(false);
    expect(strategy(response(500), "alice")).toBe(false);
  });

  test("universal should reject generic not-found pages", () => {
    const strategy = registry.get("universal");
    expect(strategy(response(200, "<h1>Welcome to alice's page</h1>"), "alice")).toBe(true);
    expect(strategy(response(200, "<h1>Page Not Found</h1>"), "alice")).toBe(false);
    expect(strategy(response(200, "Sorry, this page isn&#39;t available."), "alice")).toBe(false);
    expect(strategy(response(403, "forbidden"), "alice")).toBe(false);
  });

  test("universal should reject every phrase in the not-found data file", () => {
    const strategy = registry.get("universal");
    expect(notFoundPhrases.length).toBeGreaterThan(0);
    for (const phrase of notFoundPhrases) {
      expect(strategy(response(200, `<p>${phrase.toUpperCase()}</p>`), "alice")).toBe(false);
    }
  });

  test("should fall back to universal for unknown or missing ids", () => {
    expect(registry.get("no-such-strategy")(response(200, "User not found"), "alice")).toBe(false);
    expect(registry.get(undefined)(response(200, "hello"), "alice")).toBe(true);
  });
});

describe("markers strategies", () => {
  const registry = createDefaultStrategyRegistry();

  test("github should accept a page whose title names the user", () => {
    const body = "<html><head><title>alice (Alice Example) · GitHub</title></head><body></body></html>";
    expect(registry.evaluate("github", response(200, body), "alice")).toBe(true);
  });

  test("github profile markers should require the username in the page", () => {
    const withoutName = "<html><head><title>GitHub</title></head><body><div class=\"vcard-names-container\"></div></body></html>";
    const withName = "<html><head><title>GitHub</title></head><body><div class=\"vcard-names-container\">alice</div></body></html>";

    expect(registry.evaluate("github", response(200, withoutName), "alice")).toBe(false);
    expect(registry.evaluate("github", response(200, withName), "alice")).toBe(true);
  });

  test("github should accept a real avatar but not an identicon", () => {
    const avatar = "<html><head><title>GitHub</title></head><body><img src=\"https://avatars.githubusercontent.com/u/1?v=4\"></body></html>";
    const identicon = "<html><head><title>GitHub</title></head><body><img src=\"https://avatars.githubusercontent.com/identicon/bob\"></body></html>";

    expect(registry.evaluate("github", response(200, avatar), "alice")).toBe(true);
    expect(registry.evaluate("github", response(200, identicon), "alice")).toBe(false);
  });

  test("github should reject its not-found page even with the username present", () => {
    const body = "<html><head><title>alice</title></head><body>This is not the web page you are looking for</body></html>";
    expect(registry.evaluate("github", response(200, body), "alice")).toBe(false);
  });

  test("should fold encoded apostrophes before matching", () => {
    expect(registry.evaluate("instagram", response(200, "Sorry, this page isn&#x27;t available."), "alice")).toBe(false);
    expect(registry.evaluate("instagram", response(200, "Sorry, this page isn’t available."), "alice")).toBe(false);
    expect(registry.evaluate("instagram", response(200, "<main>alice</main>"), "alice")).toBe(true);
  });

  test("should treat any non-200 status as absent", () => {
    expect(registry.evaluate("instagram", response(301, "<main>alice</main>"), "alice")).toBe(false);
  });
});

describe("redirect strategy", () => {
  const registry = createDefaultStrategyRegistry();

  test("should count statuses other than 404 as existing", () => {
    expect(registry.evaluate("twitter", response(200, "", "https://x.com/alice"), "alice")).toBe(true);
    expect(registry.evaluate("twitter", response(403, "", "https://x.com/alice"), "alice")).toBe(true);
    expect(registry.evaluate("twitter", response(429, "", "https://x.com/alice"), "alice")).toBe(true);
    expect(registry.evaluate("twitter", response(404, "", "https://x.com/alice"), "alice")).toBe(false);
  });

  test("should reject a redirect to a rejected URL", () => {
    expect(registry.evaluate("twitter", response(200, "", "https://x.com/home"), "alice")).toBe(false);
    expect(registry.evaluate("twitter", response(200, "", "https://twitter.com/home?ref=x"), "alice")).toBe(false);
  });

  test("should reject not-found phrases", () => {
    expect(registry.evaluate("twitter", response(200, "This account doesn’t exist"), "alice")).toBe(false);
    expect(registry.evaluate("gitlab", response(200, "The page could not be found"), "alice")).toBe(false);
  });
});

describe("ExistenceStrategyRegistry", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  test("should resolve a strategy that throws to false", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
    const registry = new ExistenceStrategyRegistry();
    registry.register("broken", () => {
      throw new Error("boom");
    });

    expect(registry.evaluate("broken", response(200), "alice")).toBe(false);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  test("should register definitions without a dispatch change", () => {
    const registry = new ExistenceStrategyRegistry({
      example: { kind: "redirect", rejectUrls: ["/login"], notFound: [] },
    });

    expect(registry.has("example")).toBe(true);
    expect(registry.evaluate("example", response(302, "", "https://e.test/alice"), "alice")).toBe(true);
    expect(registry.evaluate("example", response(200, "", "https://e.test/login"), "alice")).toBe(false);
  });

  test("should always hold status_code and universal", () => {
    const ids = new ExistenceStrategyRegistry().ids();
    expect(ids).toEqual(["status_code", "universal"]);
  });
});

describe("parseStrategyDefinitions", () => {
  test("should fill in marker defaults", () => {
    const defs = parseStrategyDefinitions({ example: { kind: "markers" } });
    expect(defs.example).toEqual({
      kind: "markers",
      notFound: [],
      profile: [],
      profileNeedsUsername: false,
      usernameInTitle: false,
      avatarHosts: [],
      fallback: true,
    });
  });

  test("should reject unknown kinds", () => {
    expect(() => parseStrategyDefinitions({ example: { kind: "magic" } })).toThrow(StrategyDefinitionError);
  });

  test("should reject unexpected field types", () => {
    expect(() => parseStrategyDefinitions({ example: { kind: "markers", notFound: "nope" } })).toThrow(StrategyDefinitionError);
  });
});
