import { describe, it, expect, vi } from "vitest";
import { NewsApiClient } from "../../adapters/newsapi.js";
import { SourceService } from "../source-service.js";

const SOURCES = [
  { id: "wire", name: "The Wire", country: "us", category: "general", language: "en" },
  { id: "wire", name: "The Wire (mirror)", country: "us", category: "general", language: "en" },
  { id: null, name: "Ars Daily", url: "https://ars.example.test", country: "gb", category: "technology", language: "en" },
  { id: "bbc", name: "BBC News", country: "gb", category: "general", language: "en" },
];

const HEADLINES = [
  { title: "Headline one", url: "https://bbc.example.test/1", source: { id: "bbc", name: "BBC News" } },
];

const EVERYTHING = [
  { title: "Older", url: "https://u.example.test/1", publishedAt: "2026-10-01T00:00:00Z", source: { name: "Unlisted Times" } },
  { title: "Elsewhere", url: "https://o.example.test/1", publishedAt: "2026-10-03T00:00:00Z", source: { name: "Other Post" } },
  { title: "Newer", url: "https://u.example.test/2", publishedAt: "2026-10-02T00:00:00Z", source: { name: "unlisted times" } },
];

function fakeUpstream() {
  return vi.fn<typeof fetch>(async (input) => {
    const url = new URL(String(input));
    let body: unknown;
    if (url.pathname.endsWith("/top-headlines/sources")) {
      body = { status: "ok", sources: SOURCES };
    } else if (url.pathname.endsWith("/top-headlines")) {
      body = { status: "ok", totalResults: HEADLINES.length, articles: HEADLINES };
    } else {
      body = { status: "ok", totalResults: EVERYTHING.length, articles: EVERYTHING };
    }
    return new Response(JSON.stringify(body), { status: 200 });
  });
}

function setup(now: () => number = () => 0, maxCacheEntries?: number) {
  const fetchImpl = fakeUpstream();
  const client = new NewsApiClient({ apiKey: "test-secret", baseUrl: "https://news.example.test/v2", fetchImpl });
  return { fetchImpl, service: new SourceService(client, { cacheTtlMs: 1000, maxCacheEntries, now }) };
}

describe("SourceService", () => {
  it("de-duplicates sources and sorts them by name", async () => {
    const { service } = setup();
    const sources = await service.listSources({});
    expect(sources.map((s) => s.name)).toEqual(["Ars Daily", "BBC News", "The Wire"]);
  });

  it("normalizes the filter before asking upstream", async () => {
    const { service, fetchImpl } = setup();
    await service.listSources({ country: " US ", language: "" });

    const url = new URL(String(fetchImpl.mock.calls[0][0]));
    expect(url.searchParams.get("country")).toBe("us");
    expect(url.searchParams.has("language")).toBe(false);
  });

  it("caches the list until the TTL runs out", async () => {
    let clock = 0;
    const { service, fetchImpl } = setup(() => clock);

    await service.listSources({});
    await service.listSources({});
    expect(fetchImpl).toHaveBeenCalledTimes(1);

    clock = 1001;
    await service.listSources({});
    expect(fetchImpl).toHaveBeenCalledTimes(2);
  });

  it("drops an expired entry when it is looked up", async () => {
    let clock = 0;
    const { service, fetchImpl } = setup(() => clock);

    await service.listSources({ country: "us" });
    expect(service.cacheSize()).toBe(1);

    clock = 1001;
    fetchImpl.mockRejectedValueOnce(new Error("socket hang up"));
    await expect(service.listSources({ country: "us" })).rejects.toThrow("News API unreachable");

    expect(service.cacheSize()).toBe(0);
  });

  it("keeps the cache bounded across many distinct filters", async () => {
    let clock = 0;
    const { service } = setup(() => clock, 8);

    for (let i = 0; i < 200; i++) {
      clock = i * 2;
      await service.listSources({ country: `c${i}` });
    }

    expect(service.cacheSize()).toBe(8);
  });

  it("drops the oldest filter first", async () => {
    const { service, fetchImpl } = setup(() => 0, 2);

    await service.listSources({ country: "aa" });
    await service.listSources({ country: "bb" });
    await service.listSources({ country: "cc" });
    expect(fetchImpl).toHaveBeenCalledTimes(3);

    await service.listSources({ country: "cc" });
    expect(fetchImpl).toHaveBeenCalledTimes(3);

    await service.listSources({ country: "aa" });
    expect(fetchImpl).toHaveBeenCalledTimes(4);
  });

  it("derives facets from the full list", async () => {
    const { service } = setup();
    expect(await service.facets()).toEqual({
      countries: ["gb", "us"],
      categories: ["general", "technology"],
      languages: ["en"],
    });
  });

  it("profiles a listed source from its headlines", async () => {
    const { service, fetchImpl } = setup();
    const profile = await service.profile("bbc news");

    expect(profile.found).toBe(true);
    expect(profile.source.id).toBe("bbc");
    expect(profile.articles.map((a) => a.title)).toEqual(["Headline one"]);
    const headlinesUrl = new URL(String(fetchImpl.mock.calls[1][0]));
    expect(headlinesUrl.searchParams.get("sources")).toBe("bbc");
  });

  it("falls back to a name search for an unlisted source", async () => {
    const { service } = setup();
    const profile = await service.profile("Unlisted Times");

    expect(profile.found).toBe(false);
    expect(profile.source.name).toBe("Unlisted Times");
    expect(profile.articles.map((a) => a.title)).toEqual(["Newer", "Older"]);
  });
});
