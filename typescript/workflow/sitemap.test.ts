import { describe, expect, it, vi } from "vitest";
import type { HttpFetch, HttpResponse } from "../shared/http.js";
import { HttpSitemapFetcher, parseSitemap } from "./sitemap.js";

function urlset(...locs: string[]): string {
  const entries = locs.map((loc) => `<url><loc>${loc}</loc><lastmod>2024-01-01</lastmod></url>`);
  return `<?xml version="1.0" encoding="UTF-8"?>
<urlset xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">${entries.join("")}</urlset>`;
}

function sitemapIndex(...locs: string[]): string {
  const entries = locs.map((loc) => `<sitemap><loc>${loc}</loc></sitemap>`);
  return `<?xml version="1.0" encoding="UTF-8"?>
<sitemapindex xmlns="http://www.sitemaps.org/schemas/sitemap/0.9">${entries.join("")}</sitemapindex>`;
}

function fakeFetch(documents: Record<string, string>) {
  return vi.fn<HttpFetch>(async (url: string): Promise<HttpResponse> => {
    const body = documents[url];
    return {
      ok: body !== undefined,
      status: body !== undefined ? 200 : 404,
      text: async () => body ?? "Not Found",
    };
  });
}

describe("parseSitemap", () => {
  it("extracts page locations in document order", () => {
    const parsed = parseSitemap(urlset("https://example.com/", " https://example.com/about ", "https://example.com/blog"));
    expect(parsed).toEqual({
      pages: ["https://example.com/", "https://example.com/about", "https://example.com/blog"],
      sitemaps: [],
    });
  });

  it("extracts child sitemaps from an index", () => {
    const parsed = parseSitemap(sitemapIndex("https://example.com/pages.xml", "https://example.com/posts.xml"));
    expect(parsed).toEqual({
      pages: [],
      sitemaps: ["https://example.com/pages.xml", "https://example.com/posts.xml"],
    });
  });

  it("returns nothing for documents that are not sitemaps", () => {
    expect(parseSitemap("<html><body><loc>https://example.com/x</loc></body></html>")).toEqual({
      pages: [],
      sitemaps: [],
    });
  });
});

describe("HttpSitemapFetcher", () => {
  it("uses the first conventional location that lists pages", async () => {
    const httpFetch = fakeFetch({
      "https://example.com/sitemap.xml": urlset("https://example.com/", "https://example.com/pricing"),
    });
    const fetcher = new HttpSitemapFetcher({ httpFetch });

    await expect(fetcher.fetch("https://example.com")).resolves.toEqual([
      "https://example.com/",
      "https://example.com/pricing",
    ]);
    expect(httpFetch).toHaveBeenCalledTimes(1);
  });

  it("falls through to later locations", async () => {
    const httpFetch = fakeFetch({
      "https://example.com/sitemap.xml": urlset(),
      "https://example.com/sitemap/sitemap.xml": urlset("https://example.com/contact"),
    });
    const fetcher = new HttpSitemapFetcher({ httpFetch });

    await expect(fetcher.fetch("https://example.com")).resolves.toEqual(["https://example.com/contact"]);
    expect(httpFetch.mock.calls.map(([url]) => url)).toEqual([
      "https://example.com/sitemap.xml",
      "https://example.com/sitemap_index.xml",
      "https://example.com/sitemap/sitemap.xml",
    ]);
  });

  it("follows sitemap indexes", async () => {
    const httpFetch = fakeFetch({
      "https://example.com/sitemap.xml": sitemapIndex(
        "https://example.com/sitemap-pages.xml",
        "https://example.com/sitemap-posts.xml"
      ),
      "https://example.com/sitemap-pages.xml": urlset("https://example.com/", "https://example.com/about"),
      "https://example.com/sitemap-posts.xml": urlset("https://example.com/blog/first"),
    });
    const fetcher = new HttpSitemapFetcher({ httpFetch });

    await expect(fetcher.fetch("https://example.com")).resolves.toEqual([
      "https://example.com/",
      "https://example.com/about",
      "https://example.com/blog/first",
    ]);
  });

  it("returns null when every location is missing", async () => {
    const fetcher = new HttpSitemapFetcher({ httpFetch: fakeFetch({}) });
    await expect(fetcher.fetch("https://example.com")).resolves.toBeNull();
  });

  it("treats network failures as a missing sitemap", async () => {
    const httpFetch = vi.fn<HttpFetch>(async () => {
      throw new Error("getaddrinfo ENOTFOUND example.com");
    });
    const fetcher = new HttpSitemapFetcher({ httpFetch });

    await expect(fetcher.fetch("https://example.com")).resolves.toBeNull();
    expect(httpFetch).toHaveBeenCalledTimes(3);
  });
});
