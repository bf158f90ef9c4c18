import { describe, it, expect } from "vitest";
import { parse } from "node-html-parser";
import { categorize, roleHintOf } from "../src/utils/categorizer.js";

const firstElement = (html: string) => {
  const element = parse(html).querySelector("*");
  if (!element) throw new Error("fixture has no element");
  return element;
};

describe("roleHintOf", () => {
  it("reads release-* class tokens", () => {
    expect(roleHintOf(firstElement('<div class="release-feature">x</div>'))).toBe("feature");
    expect(roleHintOf(firstElement('<div class="note release-changed">x</div>'))).toBe("changed");
    expect(roleHintOf(firstElement('<div class="release-announcement">x</div>'))).toBe("announcement");
    expect(roleHintOf(firstElement('<div class="release-breaking">x</div>'))).toBe("breaking");
    expect(roleHintOf(firstElement('<div class="release-issue">x</div>'))).toBe("issue");
  });

  it("prefers feature when several role tokens are present", () => {
    expect(roleHintOf(firstElement('<div class="release-issue release-feature">x</div>'))).toBe("feature");
  });

  it("returns undefined for elements without a role token", () => {
    expect(roleHintOf(firstElement("<p>plain</p>"))).toBeUndefined();
    expect(roleHintOf(firstElement('<div class="release-features-list">x</div>'))).toBeUndefined();
  });
});

describe("categorize", () => {
  describe("structural hints", () => {
    it("maps feature to ga unless the text carries a preview marker", () => {
      expect(categorize("feature", "Cloud Run jobs are available")).toBe("ga");
      expect(categorize("feature", "Volume mounts (Preview)")).toBe("public-preview");
      expect(categorize("feature", "Volume mounts (PREVIEW)")).toBe("public-preview");
    });

    it("maps the remaining hints directly", () => {
      expect(categorize("changed", "anything")).toBe("change");
      expect(categorize("announcement", "anything")).toBe("announcement");
      expect(categorize("breaking", "anything")).toBe("breaking");
      expect(categorize("issue", "anything")).toBe("issue");
    });

    it("takes priority over keywords", () => {
      expect(categorize("changed", "Security fix for CVE-2024-0001")).toBe("change");
      expect(categorize("feature", "Security hardening is generally available")).toBe("ga");
    });
  });

  describe("keyword cascade", () => {
    it.each([
      ["Security patch released (CVE-1234)", "security"],
      ["Breaking change: the v1 endpoint is gone", "breaking"],
      ["Now in public preview", "public-preview"],
      ["Streaming is in beta", "public-preview"],
      ["Jobs are now generally available", "ga"],
      ["The old flag is deprecated", "deprecated"],
      ["Fixed a crash on startup", "fixed"],
      ["Known issue with uploads; use the workaround", "issue"],
      ["Default memory changed: 512 MiB", "change"],
      ["Introducing regional endpoints", "announcement"],
      ["New client library for Go", "libraries"],
      ["Console layout refreshed", "update"],
    ])("classifies %j as %s", (text, expected) => {
      expect(categorize(undefined, text)).toBe(expected);
    });

    it("resolves ambiguous text by cascade order", () => {
      expect(categorize(undefined, "Security update now in preview")).toBe("security");
      expect(categorize(undefined, "Beta SDK deprecated")).toBe("public-preview");
      expect(categorize(undefined, "Fixed an issue with the API")).toBe("fixed");
    });

    it("matches substrings case-insensitively", () => {
      expect(categorize(undefined, "BUGFIX release")).toBe("fixed");
      expect(categorize(undefined, "Rapid deployment")).toBe("libraries");
    });
  });

  it("defaults to update for empty text", () => {
    expect(categorize(undefined, "")).toBe("update");
  });

  it("is deterministic", () => {
    const text = "Introducing the new SDK";
    expect(categorize(undefined, text)).toBe(categorize(undefined, text));
  });
});
