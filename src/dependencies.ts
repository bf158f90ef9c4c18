import { DependencyError } from "./errors.js";

/** Packages the CLI cannot run without. */
export const REQUIRED_PACKAGES: ReadonlyArray<string> = [
  "axios",
  "node-html-parser",
  "luxon",
  "commander",
  "dotenv",
  "zod",
];

export type ModuleLoader = (specifier: string) => Promise<unknown>;

const importModule: ModuleLoader = (specifier) => import(specifier);

export async function findMissingPackages(
  packages: ReadonlyArray<string> = REQUIRED_PACKAGES,
  load: ModuleLoader = importModule
): Promise<string[]> {
  const missing: string[] = [];
  for (const name of packages) {
    try {
      await load(name);
    } catch {
      missing.push(name);
    }
  }
  return missing;
}

export function formatMissingPackages(missing: ReadonlyArray<string>): string {
  return [
    "Error: Required packages not installed.",
    `Missing packages: ${missing.join(", ")}`,
    "Please install using npm:",
    `  npm install ${missing.join(" ")}`,
    "",
    "Or install all dependencies from the project root:",
    "  npm install",
  ].join("\n");
}

/**
 * @throws {DependencyError} Listing every package that failed to load.
 */
export async function checkDependencies(load: ModuleLoader = importModule): Promise<void> {
  const missing = await findMissingPackages(REQUIRED_PACKAGES, load);
  if (missing.length > 0) {
    throw new DependencyError(missing);
  }
}

/**
 * Runs `checkDependencies` and prints install instructions for a `DependencyError`.
 * Resolves to the process exit code: 0 when every package loads, 1 otherwise.
 */
export async function reportMissingDependencies(load: ModuleLoader = importModule): Promise<number> {
  try {
    await checkDependencies(load);
    return 0;
  } catch (error: unknown) {
    if (error instanceof DependencyError) {
      console.error(formatMissingPackages(error.missingPackages));
      return 1;
    }
    throw error;
  }
}
