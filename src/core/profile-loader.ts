// ============================================
// Profile Loader — grounding context
// ============================================

import * as fs from "node:fs";
import * as path from "node:path";
import type { AgentIdentity } from "../types.js";
import { ContextLoadError, describeError } from "./errors.js";

/**
 * Read a UTF-8 text file. Missing or unreadable files throw `ContextLoadError`.
 */
export function loadTextFile(filePath: string): string {
  const absolute = path.resolve(filePath);
  try {
    return fs.readFileSync(absolute, "utf-8");
  } catch (err) {
    throw new ContextLoadError(absolute, describeError(err), { cause: err });
  }
}

/**
 * Extract the text of every page of a PDF, one page after another,
 * separated by a newline.
 */
export async function extractPdfText(data: Uint8Array): Promise<string> {
  const { getDocument } = await import("pdfjs-dist/legacy/build/pdf.mjs");
  const pdf = await getDocument({ data, useSystemFonts: true }).promise;
  const pages: string[] = [];

  try {
    for (let i = 1; i <= pdf.numPages; i++) {
      const page = await pdf.getPage(i);
      const content = await page.getTextContent();
      let text = "";
      for (const item of content.items) {
        if ("str" in item) {
          text += item.str + (item.hasEOL ? "\n" : "");
        }
      }
      pages.push(text.trimEnd());
    }
  } finally {
    await pdf.destroy();
  }

  return pages.join("\n");
}

/**
 * Load the profile document. `.pdf` files go through text extraction,
 * anything else is read as UTF-8 text.
 */
export async function loadProfileDocument(filePath: string): Promise<string> {
  if (path.extname(filePath).toLowerCase() !== ".pdf") {
    return loadTextFile(filePath);
  }

  const absolute = path.resolve(filePath);
  let data: Uint8Array;
  try {
    data = new Uint8Array(fs.readFileSync(absolute));
  } catch (err) {
    throw new ContextLoadError(absolute, describeError(err), { cause: err });
  }

  try {
    return await extractPdfText(data);
  } catch (err) {
    throw new ContextLoadError(absolute, `could not extract PDF text: ${describeError(err)}`, {
      cause: err,
    });
  }
}

/**
 * Load the identity once at startup. The result is frozen; nothing mutates
 * the grounding context between turns.
 */
export async function loadIdentity(
  name: string,
  summaryPath: string,
  profileDocumentPath: string,
): Promise<AgentIdentity> {
  const summary = loadTextFile(summaryPath);
  const profile = await loadProfileDocument(profileDocumentPath);

  console.log(
    `[Profile] Loaded context for "${name}" ` +
      `(summary: ${summary.length} chars, profile: ${profile.length} chars)`,
  );

  return Object.freeze({ name, summary, profile });
}
