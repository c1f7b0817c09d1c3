// src/core/shaders/preprocessor.ts
import { readFile } from "node:fs/promises";

/** Reads the text of a shader file. */
export type ShaderSourceReader = (fileUrl: URL) => Promise<string>;

const readFromDisk: ShaderSourceReader = (fileUrl) =>
  readFile(fileUrl, "utf8");

/**
 * A preprocessor for WGSL shaders that handles #include directives.
 * It reads shader source code, resolves includes relative to the including
 * file, and caches the results to avoid redundant work.
 */
export class ShaderPreprocessor {
  private readonly fileCache = new Map<string, Promise<string>>();
  private readonly includeRegex = /#include\s+"(.+)"/g;

  constructor(private readonly readSource: ShaderSourceReader = readFromDisk) {}

  /**
   * Processes a shader file, resolving all #include directives.
   * @param sourceUrl The URL of the main shader file to process.
   * @returns A promise that resolves to the final, flattened shader code.
   */
  public async process(sourceUrl: URL): Promise<string> {
    return this.processFile(sourceUrl, new Set());
  }

  private async processFile(
    fileUrl: URL,
    visited: Set<string>,
  ): Promise<string> {
    const key = fileUrl.href;
    if (visited.has(key)) {
      throw new Error(`Circular dependency detected in shaders: ${key}`);
    }
    visited.add(key);

    let pending = this.fileCache.get(key);
    if (!pending) {
      pending = this.readSource(fileUrl).catch((error: unknown) => {
        this.fileCache.delete(key);
        throw new Error(`Could not read shader file: ${key}`, { cause: error });
      });
      this.fileCache.set(key, pending);
    }
    const sourceCode = await pending;

    const replacements = new Map<string, string>();

    // First, find all includes and process them in parallel
    await Promise.all(
      Array.from(sourceCode.matchAll(this.includeRegex), async (match) => {
        const includeUrl = new URL(match[1], fileUrl);
        const includedCode = await this.processFile(
          includeUrl,
          new Set(visited),
        );
        replacements.set(match[0], includedCode);
      }),
    );

    // After all includes are processed, replace them in the source code
    return sourceCode.replace(
      this.includeRegex,
      (match) => replacements.get(match) ?? "",
    );
  }
}
