import type { HTMLElement } from "node-html-parser";
import { RELEASE_ROLE_CLASSES } from "../constants.js";
import type { Category, StructuralHint } from "../types.js";

interface KeywordRule {
  category: Category;
  keywords: ReadonlyArray<string>;
}

// First hit wins, so a fragment mentioning both "security" and "beta" is security.
const KEYWORD_RULES: ReadonlyArray<KeywordRule> = [
  { category: "security", keywords: ["security", "vulnerability", "cve", "patch"] },
  { category: "breaking", keywords: ["breaking change", "migration required", "major version update"] },
  {
    category: "public-preview",
    keywords: ["(preview)", "public preview", "in preview", "preview)", "early access", "beta"],
  },
  {
    category: "ga",
    keywords: [
      "generally available",
      "general availability",
      "(ga)",
      "is now ga",
      "is in ga",
      "in general availability",
    ],
  },
  { category: "deprecated", keywords: ["deprecated", "deprecation", "obsolete", "removed", "discontinued"] },
  { category: "fixed", keywords: ["fixed", "fix:", "resolved", "bug"] },
  { category: "issue", keywords: ["issue", "known issue", "workaround"] },
  { category: "change", keywords: ["changed:", "migration required", "version updates"] },
  { category: "announcement", keywords: ["announced", "announcement", "introducing"] },
  { category: "libraries", keywords: ["library", "sdk", "api", "client library", "framework"] },
];

const HINT_ORDER: ReadonlyArray<StructuralHint> = ["feature", "changed", "announcement", "breaking", "issue"];

/**
 * Reads the structural hint from an element's `release-*` class tokens.
 */
export function roleHintOf(element: HTMLElement): StructuralHint | undefined {
  const tokens = (element.getAttribute("class") ?? "").split(/\s+/).filter(Boolean);
  return HINT_ORDER.find((hint) => tokens.includes(RELEASE_ROLE_CLASSES[hint]));
}

export function hasReleaseRole(element: HTMLElement): boolean {
  return roleHintOf(element) !== undefined;
}

/**
 * Assigns a category to a fragment. A structural hint always beats the keyword cascade.
 */
export function categorize(hint: StructuralHint | undefined, text: string): Category {
  switch (hint) {
    case "feature":
      return text.toLowerCase().includes("(preview)") ? "public-preview" : "ga";
    case "changed":
      return "change";
    case "announcement":
      return "announcement";
    case "breaking":
      return "breaking";
    case "issue":
      return "issue";
  }

  if (!text) {
    return "update";
  }

  const lower = text.toLowerCase();
  const rule = KEYWORD_RULES.find(({ keywords }) => keywords.some((keyword) => lower.includes(keyword)));
  return rule?.category ?? "update";
}
