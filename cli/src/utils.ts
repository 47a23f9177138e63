import { readFile } from "fs/promises";
import { extname } from "path";
import chalk from "chalk";
import type { Detection } from "@edgepulse/protocol";

const IMAGE_TYPES: Record<string, string> = {
  ".png": "image/png",
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".gif": "image/gif",
  ".webp": "image/webp",
  ".bmp": "image/bmp",
  ".tif": "image/tiff",
  ".tiff": "image/tiff",
};

export function handleError(error: Error): void {
  console.error(chalk.red("Error:"), error.message);
  process.exit(1);
}

// Error handler wrapper for commander actions
export function withErrorHandler<A extends unknown[]>(fn: (...args: A) => Promise<void>) {
  return async (...args: A): Promise<void> => {
    try {
      await fn(...args);
    } catch (error) {
      handleError(error instanceof Error ? error : new Error(String(error)));
    }
  };
}

export function imageMimeType(path: string): string {
  const type = IMAGE_TYPES[extname(path).toLowerCase()];
  if (!type) {
    throw new Error(`Unsupported image extension: ${extname(path) || "(none)"}`);
  }
  return type;
}

export async function readImageAsDataUrl(path: string): Promise<string> {
  const mimeType = imageMimeType(path);
  const bytes = await readFile(path);
  return `data:${mimeType};base64,${bytes.toString("base64")}`;
}

export function formatDetection(detection: Detection): string {
  const [x, y, w, h] = detection.bbox;
  const box = [x, y, w, h].map((v) => v.toFixed(2)).join(", ");
  return `${detection.className.padEnd(9)} ${(detection.confidence * 100).toFixed(0)}%  [${box}]`;
}
