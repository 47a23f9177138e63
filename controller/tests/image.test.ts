import { describe, test, expect } from "vitest";
import { decodeImageData, fitWithin, preprocessImage } from "../src/utils/image";
import { InvalidInputError } from "../src/utils/errors";
import { solidImage } from "./helpers";

const BOUNDS = { maxWidth: 800, maxHeight: 600 };

describe("fitWithin", () => {
  test("scales an oversized image to the bounds", () => {
    expect(fitWithin(2000, 1500, BOUNDS)).toEqual({ width: 800, height: 600 });
  });

  test("scales by width first, then by height", () => {
    expect(fitWithin(1000, 300, BOUNDS)).toEqual({ width: 800, height: 240 });
    expect(fitWithin(300, 1200, BOUNDS)).toEqual({ width: 150, height: 600 });
  });

  test("leaves images inside the bounds alone", () => {
    expect(fitWithin(640, 480, BOUNDS)).toEqual({ width: 640, height: 480 });
  });
});

describe("decodeImageData", () => {
  test("accepts plain base64", () => {
    expect(decodeImageData("aGVsbG8=").toString("utf8")).toBe("hello");
  });

  test("accepts an image data URL", () => {
    expect(decodeImageData("data:image/png;base64,aGVsbG8=").toString("utf8")).toBe(
      "hello"
    );
  });

  test("rejects a data URL with a non-image media type", () => {
    expect(() => decodeImageData("data:text/plain;base64,aGVsbG8=")).toThrow(
      "Invalid input: unsupported media type text/plain"
    );
  });

  test("rejects a data URL that is not base64 encoded", () => {
    expect(() => decodeImageData("data:image/png,hello")).toThrow(
      "Invalid input: data URL must be base64 encoded"
    );
  });

  test("rejects text that is not base64", () => {
    expect(() => decodeImageData("not*base64!")).toThrow(InvalidInputError);
  });

  test("rejects an empty payload", () => {
    expect(() => decodeImageData("data:image/png;base64,")).toThrow(
      "Invalid input: image payload is empty"
    );
  });
});

describe("preprocessImage", () => {
  test("resizes to the bounds and normalizes pixels", async () => {
    const prepared = await preprocessImage(await solidImage(2000, 1500), BOUNDS);

    expect(prepared.originalWidth).toBe(2000);
    expect(prepared.originalHeight).toBe(1500);
    expect(prepared.width).toBe(800);
    expect(prepared.height).toBe(600);
    expect(prepared.channels).toBe(3);
    expect(prepared.tensor).toHaveLength(800 * 600 * 3);
    expect(prepared.tensor[0]).toBeCloseTo(1, 2);
    expect(prepared.tensor[1]).toBeCloseTo(0, 2);
  });

  test("rejects bytes that are not an image", async () => {
    await expect(
      preprocessImage(Buffer.from("definitely not an image"), BOUNDS)
    ).rejects.toThrow("Invalid input: payload is not a decodable image");
  });

  test("rejects an empty buffer", async () => {
    await expect(preprocessImage(Buffer.alloc(0), BOUNDS)).rejects.toBeInstanceOf(
      InvalidInputError
    );
  });
});
