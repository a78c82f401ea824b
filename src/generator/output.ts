import fs from "node:fs/promises";
import path from "node:path";
import { IOError, describeError } from "./errors.js";

export const GENERATED_FILE_EXTENSION = ".ts";

export function resolveOutputPath(
  outputDirectory: string,
  className: string,
  extension: string = GENERATED_FILE_EXTENSION
): string {
  return path.join(outputDirectory, `${className}${extension}`);
}

export async function writeGeneratedFile(
  outputDirectory: string,
  className: string,
  text: string,
  extension: string = GENERATED_FILE_EXTENSION
): Promise<string> {
  const filePath = resolveOutputPath(outputDirectory, className, extension);
  try {
    await fs.mkdir(outputDirectory, { recursive: true });
    const handle = await fs.open(filePath, "w");
    try {
      await handle.writeFile(text, "utf8");
      await handle.sync();
    } finally {
      await handle.close();
    }
  } catch (error) {
    throw new IOError(filePath, `Failed to write ${filePath}: ${describeError(error)}`, {
      cause: error,
    });
  }
  return filePath;
}
