import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { ContextLoadError } from "../core/errors.js";
import { loadIdentity, loadProfileDocument, loadTextFile } from "../core/profile-loader.js";
import { silenceConsole } from "./fixtures.js";

const TWO_PAGE_PDF = fileURLToPath(new URL("./data/two-page-profile.pdf", import.meta.url));
const SAMPLE_PROFILE_PDF = fileURLToPath(new URL("../../me/profile.pdf", import.meta.url));

describe("profile loader", () => {
  let dir: string;

  beforeEach(() => {
    silenceConsole();
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "profile-agent-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  function write(name: string, content: string): string {
    const filePath = path.join(dir, name);
    fs.writeFileSync(filePath, content, "utf-8");
    return filePath;
  }

  it("reads a text file as is", () => {
    const filePath = write("summary.txt", "Backend engineer.\nBased in Lisbon.\n");

    expect(loadTextFile(filePath)).toBe("Backend engineer.\nBased in Lisbon.\n");
  });

  it("throws ContextLoadError for a missing file", () => {
    expect(() => loadTextFile(path.join(dir, "missing.txt"))).toThrow(ContextLoadError);
  });

  it("reads a non-PDF profile document as text", async () => {
    const filePath = write("profile.md", "# Jane Doe\nStaff Engineer");

    await expect(loadProfileDocument(filePath)).resolves.toBe("# Jane Doe\nStaff Engineer");
  });

  it("extracts the text of a PDF page by page", async () => {
    await expect(loadProfileDocument(TWO_PAGE_PDF)).resolves.toBe("Jane Doe\nStaff Engineer");
  });

  it("builds an identity from a PDF profile document", async () => {
    const summaryPath = write("summary.txt", "Summary text");

    const identity = await loadIdentity("Jane Doe", summaryPath, TWO_PAGE_PDF);

    expect(identity.profile).toBe("Jane Doe\nStaff Engineer");
  });

  it("loads the sample profile shipped as the default document", async () => {
    const text = await loadProfileDocument(SAMPLE_PROFILE_PDF);

    expect(text.split("\n").slice(0, 2)).toEqual(["Jane Doe", "Senior Backend Engineer"]);
  });

  it("throws ContextLoadError for a file that is not a valid PDF", async () => {
    const filePath = write("profile.pdf", "this is not a pdf");

    await expect(loadProfileDocument(filePath)).rejects.toBeInstanceOf(ContextLoadError);
  });

  it("throws ContextLoadError for a missing PDF", async () => {
    await expect(loadProfileDocument(path.join(dir, "absent.pdf"))).rejects.toBeInstanceOf(ContextLoadError);
  });

  it("builds a frozen identity from both files", async () => {
    const summaryPath = write("summary.txt", "Summary text");
    const profilePath = write("profile.txt", "Profile text");

    const identity = await loadIdentity("Jane Doe", summaryPath, profilePath);

    expect(identity).toEqual({ name: "Jane Doe", summary: "Summary text", profile: "Profile text" });
    expect(Object.isFrozen(identity)).toBe(true);
  });

  it("refuses to build an identity without a summary", async () => {
    const profilePath = write("profile.txt", "Profile text");

    await expect(loadIdentity("Jane Doe", path.join(dir, "nope.txt"), profilePath)).rejects.toBeInstanceOf(
      ContextLoadError,
    );
  });
});
