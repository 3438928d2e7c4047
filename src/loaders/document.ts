import { promises as fs } from "node:fs";
import path from "node:path";

import { TextLoader } from "@langchain/classic/document_loaders/fs/text";
import { PDFLoader } from "@langchain/community/document_loaders/fs/pdf";

import { UnsupportedFormatError } from "../errors.js";

export const SUPPORTED_EXTENSIONS = [".txt", ".md", ".pdf"] as const;

export type SupportedExtension = (typeof SUPPORTED_EXTENSIONS)[number];

export function supportedExtension(filePath: string): SupportedExtension | undefined {
  const ext = path.extname(filePath).toLowerCase();
  return SUPPORTED_EXTENSIONS.find((e) => e === ext);
}

async function loadText(filePath: string): Promise<string> {
  const docs = await new TextLoader(filePath).load();
  return docs.map((d) => d.pageContent).join("");
}

async function loadPdf(filePath: string): Promise<string> {
  const pages = await new PDFLoader(filePath, { splitPages: true }).load();
  return pages
    .map((p) => p.pageContent)
    .filter((text) => text.length > 0)
    .map((text) => `${text}\n`)
    .join("");
}

export async function loadDocument(filePath: string): Promise<string> {
  const ext = supportedExtension(filePath);
  if (!ext) {
    throw new UnsupportedFormatError(filePath, path.extname(filePath).toLowerCase(), SUPPORTED_EXTENSIONS);
  }

  if (ext === ".pdf") {
    return loadPdf(filePath);
  }
  return loadText(filePath);
}

export async function listSupportedFiles(dir: string): Promise<string[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  return entries
    .filter((e) => e.isFile() && supportedExtension(e.name) !== undefined)
    .map((e) => e.name)
    .sort()
    .map((name) => path.join(dir, name));
}
