import { describe, expect, it } from "vitest";
import {
  buildDedupStore,
  collapseByFingerprint,
  deduplicate,
  emptyDedupStore,
  rememberCandidates,
  similarityRatio,
} from "../src/dedup";
import { candidate } from "./helpers";

describe("deduplicate", () => {
  it("drops repeats of an external id within a source", () => {
    const first = candidate({ externalId: "1", title: "VP Growth", sourceUrl: "https://a.example/1" });
    const repeat = candidate({ externalId: "1", title: "Chief of Staff", sourceUrl: "https://a.example/2" });
    const otherSource = candidate({
      source: "serpapi",
      externalId: "1",
      title: "Head of Brand",
      company: "Zeta",
      sourceUrl: "https://b.example/1",
    });

    const { unique, dropped } = deduplicate([first, repeat, otherSource]);

    expect(unique).toEqual([first, otherSource]);
    expect(dropped).toEqual([{ candidate: repeat, reason: "external_id" }]);
  });

  it("drops repeats of a URL", () => {
    const a = candidate({ title: "VP Growth", sourceUrl: "https://a.example/x" });
    const b = candidate({ title: "Head of Brand", company: "Zeta", sourceUrl: "https://a.example/x" });

    expect(deduplicate([a, b]).dropped.map((d) => d.reason)).toEqual(["url"]);
  });

  it("drops repeats of a fingerprint", () => {
    const a = candidate({ title: "Senior Director Growth", company: "Acme Pvt Ltd", sourceUrl: "https://a.example/1" });
    const b = candidate({ title: "Sr. Director, Growth", company: "Acme", sourceUrl: "https://b.example/1" });

    expect(deduplicate([a, b]).dropped.map((d) => d.reason)).toEqual(["fingerprint"]);
  });

  it("drops near-identical title and company pairs", () => {
    const a = candidate({ title: "VP Growth Marketing", sourceUrl: "https://a.example/1" });
    const b = candidate({ title: "VP Growth Marketng", location: "Mumbai", sourceUrl: "https://b.example/1" });

    expect(deduplicate([a, b]).dropped.map((d) => d.reason)).toEqual(["fuzzy"]);
  });

  it("keeps similar titles at different companies", () => {
    const a = candidate({ title: "VP Growth", company: "Acme", sourceUrl: "https://a.example/1" });
    const b = candidate({ title: "VP Growth", company: "Zeta", sourceUrl: "https://b.example/1" });

    expect(deduplicate([a, b]).unique).toHaveLength(2);
  });

  it("is idempotent", () => {
    const batch = [
      candidate({ title: "VP Growth", sourceUrl: "https://a.example/1" }),
      candidate({ title: "VP Growth", sourceUrl: "https://a.example/1" }),
      candidate({ title: "Head of Brand", company: "Zeta", sourceUrl: "https://a.example/2" }),
    ];

    const once = deduplicate(batch).unique;
    const twice = deduplicate(once).unique;

    expect(once).toHaveLength(2);
    expect(twice).toEqual(once);
  });

  it("drops everything already remembered in the store", () => {
    const batch = [
      candidate({ title: "VP Growth", sourceUrl: "https://a.example/1" }),
      candidate({ title: "Head of Brand", company: "Zeta", sourceUrl: "https://a.example/2" }),
    ];
    const store = emptyDedupStore();
    rememberCandidates(store, deduplicate(batch, store).unique);

    expect(deduplicate(batch, store).unique).toEqual([]);
  });

  it("checks against persisted rows", () => {
    const store = buildDedupStore([
      {
        source: "greenhouse",
        externalId: "77",
        url: "https://boards.example/77",
        fingerprint: null,
        title: "Chief Marketing Officer",
        company: "Groww",
      },
    ]);

    const { unique, dropped } = deduplicate(
      [
        candidate({ source: "greenhouse", externalId: "77", title: "Anything", sourceUrl: "https://x.example/1" }),
        candidate({ title: "Chief Marketing Officer", company: "Groww India", sourceUrl: "https://y.example/1" }),
        candidate({ title: "VP Growth", sourceUrl: "https://z.example/1" }),
      ],
      store,
    );

    expect(dropped.map((d) => d.reason)).toEqual(["external_id", "fuzzy"]);
    expect(unique.map((c) => c.title)).toEqual(["VP Growth"]);
  });
});

describe("similarityRatio", () => {
  it("scores on a 0-100 scale", () => {
    expect(similarityRatio("acme", "acme")).toBe(100);
    expect(similarityRatio("", "")).toBe(100);
    expect(similarityRatio("abcd", "abcx")).toBe(75);
  });
});

describe("collapseByFingerprint", () => {
  it("keeps the first sighting of each fingerprint", () => {
    const first = candidate({ title: "VP Growth", sourceUrl: "https://a.example/1" });
    const second = candidate({ title: "vp growth", sourceUrl: "https://b.example/1" });

    expect(collapseByFingerprint([first, second])).toEqual([first]);
  });
});
