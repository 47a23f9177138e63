import sharp from "sharp";
import { InvalidInputError } from "./errors";

export interface ImageBounds {
  maxWidth: number;
  maxHeight: number;
}

export interface PreprocessedImage {
  originalWidth: number;
  originalHeight: number;
  width: number;
  height: number;
  channels: number;
  /** Interleaved pixel values scaled to `[0, 1]`. */
  tensor: Float32Array;
}

const DATA_URL = /^data:([^;,]*)((?:;[^;,]*)*),(.*)$/s;
const BASE64 = /^[A-Za-z0-9+/_=\s-]*$/;

/**
 * Accepts plain base64 or a `data:image/*;base64,` URL and returns the
 * encoded bytes.
 */
export function decodeImageData(imageData: string): Buffer {
  let payload = imageData;

  if (imageData.startsWith("data:")) {
    const match = DATA_URL.exec(imageData);
    if (!match) {
      throw new InvalidInputError("malformed data URL");
    }
    const [, mimeType = "", parameters = "", body = ""] = match;
    if (!mimeType.startsWith("image/")) {
      throw new InvalidInputError(
        `unsupported media type ${mimeType || "(none)"}`,
        { mimeType }
      );
    }
    if (!parameters.split(";").includes("base64")) {
      throw new InvalidInputError("data URL must be base64 encoded");
    }
    payload = body;
  }

  if (!BASE64.test(payload)) {
    throw new InvalidInputError("image data is not base64");
  }

  const bytes = Buffer.from(payload, "base64");
  if (bytes.length === 0) {
    throw new InvalidInputError("image payload is empty");
  }
  return bytes;
}

/**
 * Scales `width`×`height` down until both fit the bounds, keeping the aspect
 * ratio. Images already inside the bounds are returned unchanged.
 */
export function fitWithin(
  width: number,
  height: number,
  bounds: ImageBounds
): { width: number; height: number } {
  let w = width;
  let h = height;

  if (w > bounds.maxWidth) {
    h = (h * bounds.maxWidth) / w;
    w = bounds.maxWidth;
  }

  if (h > bounds.maxHeight) {
    w = (w * bounds.maxHeight) / h;
    h = bounds.maxHeight;
  }

  return {
    width: Math.max(1, Math.round(w)),
    height: Math.max(1, Math.round(h)),
  };
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export async function preprocessImage(
  image: Buffer,
  bounds: ImageBounds
): Promise<PreprocessedImage> {
  if (image.length === 0) {
    throw new InvalidInputError("image payload is empty");
  }

  let metadata: sharp.Metadata;
  try {
    metadata = await sharp(image).metadata();
  } catch (error) {
    throw new InvalidInputError("payload is not a decodable image", {
      cause: describe(error),
    });
  }

  const { width, height } = metadata;
  if (!width || !height) {
    throw new InvalidInputError("image has no dimensions");
  }

  const target = fitWithin(width, height, bounds);

  try {
    const { data, info } = await sharp(image)
      .resize(target.width, target.height, { fit: "fill" })
      .removeAlpha()
      .raw()
      .toBuffer({ resolveWithObject: true });

    const tensor = new Float32Array(data.length);
    for (let i = 0; i < data.length; i++) {
      tensor[i] = (data[i] ?? 0) / 255;
    }

    return {
      originalWidth: width,
      originalHeight: height,
      width: info.width,
      height: info.height,
      channels: info.channels,
      tensor,
    };
  } catch (error) {
    throw new InvalidInputError("image could not be decoded", {
      cause: describe(error),
    });
  }
}
