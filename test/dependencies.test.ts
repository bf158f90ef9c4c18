import { describe, it, expect, vi, afterEach } from "vitest";
import {
  REQUIRED_PACKAGES,
  checkDependencies,
  findMissingPackages,
  formatMissingPackages,
  reportMissingDependencies,
} from "../src/dependencies.js";
import { DependencyError } from "../src/errors.js";

function loaderWithout(...absent: string[]) {
  return vi.fn(async (specifier: string) => {
    if (absent.includes(specifier)) {
      throw new Error(`Cannot find package '${specifier}'`);
    }
    return {};
  });
}

describe("findMissingPackages", () => {
  it("tries every required package", async () => {
    const load = loaderWithout();

    await expect(findMissingPackages(REQUIRED_PACKAGES, load)).resolves.toEqual([]);
    expect(load.mock.calls.map(([specifier]) => specifier)).toEqual([...REQUIRED_PACKAGES]);
  });

  it("lists the packages that fail to load", async () => {
    await expect(findMissingPackages(["axios", "luxon", "zod"], loaderWithout("luxon", "zod"))).resolves.toEqual([
      "luxon",
      "zod",
    ]);
  });

  it("finds the installed packages with the real loader", async () => {
    await expect(findMissingPackages()).resolves.toEqual([]);
  });
});

describe("formatMissingPackages", () => {
  it("prints install instructions", () => {
    expect(formatMissingPackages(["luxon", "zod"])).toBe(
      [
        "Error: Required packages not installed.",
        "Missing packages: luxon, zod",
        "Please install using npm:",
        "  npm install luxon zod",
        "",
        "Or install all dependencies from the project root:",
        "  npm install",
      ].join("\n")
    );
  });
});

describe("checkDependencies", () => {
  it("throws a DependencyError naming the missing packages", async () => {
    const error = await checkDependencies(loaderWithout("commander")).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(DependencyError);
    expect(error).toMatchObject({
      code: "ERR_MISSING_DEPENDENCY",
      missingPackages: ["commander"],
      message: "Required packages not installed: commander",
    });
  });
});

describe("reportMissingDependencies", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("resolves to 0 when every package loads", async () => {
    const log = vi.spyOn(console, "error").mockImplementation(() => {});

    await expect(reportMissingDependencies(loaderWithout())).resolves.toBe(0);
    expect(log).not.toHaveBeenCalled();
  });

  it("prints install instructions and resolves to 1 for missing packages", async () => {
    const log = vi.spyOn(console, "error").mockImplementation(() => {});

    await expect(reportMissingDependencies(loaderWithout("luxon", "zod"))).resolves.toBe(1);
    expect(log).toHaveBeenCalledWith(formatMissingPackages(["luxon", "zod"]));
  });
});
