import { describe, it, expect } from "vitest";
import { StructuredExtractor } from "../src/extractors/StructuredExtractor.js";
import { GENERIC_PROFILE } from "../src/platforms.js";
import type { PlatformProfile } from "../src/types.js";
import { SOURCE_URL, contentRootOf } from "./helpers.js";

const extract = (html: string) =>
  new StructuredExtractor(GENERIC_PROFILE, SOURCE_URL).extract(contentRootOf(html, GENERIC_PROFILE));

describe("StructuredExtractor", () => {
  it("builds one group per dated header with one item per list entry", () => {
    const groups = extract(`
      <main>
        <h2>March 5, 2024</h2>
        <ul><li>Alpha entry one</li><li>Alpha entry two</li><li>Alpha entry three</li></ul>
        <h2>February 20, 2024</h2>
        <ul><li>Second entry one</li><li>Second entry two</li><li>Second entry three</li></ul>
      </main>`);

    expect(groups).toHaveLength(2);
    expect(groups.map((group) => group.items.length)).toEqual([3, 3]);
    expect(groups[0].dateText).toBe("March 5, 2024");
    expect(groups[0].date?.toISODate()).toBe("2024-03-05");
    expect(groups[0].sourceUrl).toBe(SOURCE_URL);
    expect(groups[0].items.map((item) => item.raw)).toEqual([
      "<li>Alpha entry one</li>",
      "<li>Alpha entry two</li>",
      "<li>Alpha entry three</li>",
    ]);
    expect(groups[1].items.map((item) => item.raw)).toEqual([
      "<li>Second entry one</li>",
      "<li>Second entry two</li>",
      "<li>Second entry three</li>",
    ]);
  });

  it("turns role-marked siblings into items categorized by their role", () => {
    const [group] = extract(`
      <main>
        <h2>April 2, 2024</h2>
        <div class="release-feature">Volume mounts (Preview) are available</div>
        <div class="release-changed">Default timeout raised to 15 minutes</div>
      </main>`);

    expect(group.items.map((item) => item.category)).toEqual(["public-preview", "change"]);
  });

  it("drops paragraphs of ten characters or fewer but keeps short list entries", () => {
    const [group] = extract(`
      <main>
        <h2>2024-04-10</h2>
        <p>Tiny note</p>
        <p>Exactly10!</p>
        <p>Eleven char</p>
        <ul><li>Fix</li><li>   </li></ul>
      </main>`);

    expect(group.items.map((item) => item.raw)).toEqual(["<p>Eleven char</p>", "<li>Fix</li>"]);
    expect(group.items[1].category).toBe("update");
  });

  it("expands nested list entries individually", () => {
    const [group] = extract(`
      <main>
        <h2>2024-04-10</h2>
        <ul><li>Outer entry text<ul><li>Inner entry</li></ul></li></ul>
      </main>`);

    expect(group.items.map((item) => item.raw)).toEqual([
      "<li>Outer entry text<ul><li>Inner entry</li></ul></li>",
      "<li>Inner entry</li>",
    ]);
  });

  it("captures every link target in order, keeping duplicates", () => {
    const [group] = extract(`
      <main>
        <h2>2024-04-10</h2>
        <p>See <a href="https://a.example/docs">docs</a> and <a href="https://a.example/docs">again</a> <a>none</a> <a href="">empty</a></p>
      </main>`);

    expect(group.items[0].links).toEqual(["https://a.example/docs", "https://a.example/docs"]);
  });

  it("ignores headers without a date and dated headers without content", () => {
    const groups = extract(`
      <main>
        <h2>Overview</h2>
        <p>Some introductory paragraph text</p>
        <h2>April 2, 2024</h2>
        <h2>April 1, 2024</h2>
        <p>Only this section has content</p>
      </main>`);

    expect(groups).toHaveLength(1);
    expect(groups[0].dateText).toBe("April 1, 2024");
  });

  it("tries the next pattern when a match does not parse", () => {
    const [group] = extract(`
      <main>
        <h3>Version 2, 2024 - 2024-04-10</h3>
        <p>Release body long enough to keep</p>
      </main>`);

    expect(group.dateText).toBe("2024-04-10");
  });

  it("stops the sibling walk at any profile header and skips non-content tags", () => {
    const groups = extract(`
      <main>
        <h3>January 1, 2024</h3>
        <table><tr><td>Table content is not an item</td></tr></table>
        <p>Paragraph under the h3 heading</p>
        <h2>February 1, 2024</h2>
        <p>Paragraph under the h2 heading</p>
        <h4>Not a date</h4>
        <p>Paragraph after the h4 boundary</p>
      </main>`);

    expect(groups.map((group) => group.dateText)).toEqual(["February 1, 2024", "January 1, 2024"]);
    expect(groups[0].items.map((item) => item.raw)).toEqual(["<p>Paragraph under the h2 heading</p>"]);
    expect(groups[1].items.map((item) => item.raw)).toEqual(["<p>Paragraph under the h3 heading</p>"]);
  });

  it("reads dates split across inline elements of the header", () => {
    const [group] = extract(`
      <main>
        <h2><span>2024-05-20</span></h2>
        <p>Inline header content kept</p>
      </main>`);

    expect(group.date?.toISODate()).toBe("2024-05-20");
  });

  it("reads global date patterns from the start of every header", () => {
    const profile: PlatformProfile = { ...GENERIC_PROFILE, datePatterns: [/(\d{4}-\d{2}-\d{2})/g] };
    const html = `<main>
      <h2>2024-04-10</h2><p>First paragraph of the day</p>
      <h2>2024-04-09</h2><p>Second paragraph of the day</p>
    </main>`;

    const groups = new StructuredExtractor(profile, SOURCE_URL).extract(contentRootOf(html, profile));

    expect(groups.map((group) => group.dateText)).toEqual(["2024-04-10", "2024-04-09"]);
  });

  it("walks thousands of flat siblings in linear time", () => {
    const sections = Array.from(
      { length: 3000 },
      (_, index) =>
        `<h3>March ${(index % 28) + 1}, 2024</h3><p>Entry ${index} first detail</p><p>Entry ${index} second detail</p>`
    );
    const root = contentRootOf(`<main>${sections.join("")}</main>`, GENERIC_PROFILE);

    const started = performance.now();
    const groups = new StructuredExtractor(GENERIC_PROFILE, SOURCE_URL).extract(root);
    const elapsed = performance.now() - started;

    expect(groups).toHaveLength(3000);
    expect(groups.every((group) => group.items.length === 2)).toBe(true);
    expect(groups[2999].items[1].raw).toBe("<p>Entry 2999 second detail</p>");
    expect(elapsed).toBeLessThan(2000);
  });
});
