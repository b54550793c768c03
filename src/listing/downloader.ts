import * as fs from "fs";
import * as path from "path";
import type { AxiosInstance } from "axios";
import sharp from "sharp";
import type { Logger } from "../logger";
import type { DownloadSummary } from "../types";
import { getErrorMessage, sleep } from "../core/utils";
import { urlExtension } from "./images";

const KEPT_EXTENSIONS = new Set([".jpg", ".jpeg", ".png"]);
const JPEG_QUALITY = 95;

interface FetchedImage {
  bytes: Buffer;
  contentType: string;
}

/**
 * Download images one at a time into `folder` as img_1, img_2, ...
 * numbered by position in `urls`. WebP is re-encoded as JPEG; any other
 * format is written as received. A failed image is logged and skipped.
 * @param delayMs - Pause after every request
 */
export async function downloadImages(
  urls: string[],
  folder: string,
  http: AxiosInstance,
  delayMs: number,
  logger: Logger
): Promise<DownloadSummary> {
  fs.mkdirSync(folder, { recursive: true });
  const summary: DownloadSummary = { saved: [], failed: [] };

  for (const [i, url] of urls.entries()) {
    const index = i + 1;
    let image: FetchedImage;
    try {
      image = await fetchImage(url, http);
    } catch (err) {
      logger.exception(`Failed to download ${url}: ${getErrorMessage(err)}`, err);
      summary.failed.push({ url, error: getErrorMessage(err) });
      await sleep(delayMs);
      continue;
    }

    const ext = urlExtension(url);
    let filePath: string;
    let bytes: Buffer;

    if (image.contentType.includes("image/webp") || ext === ".webp") {
      try {
        bytes = await toJpeg(image.bytes);
      } catch (err) {
        logger.exception(`Failed to convert ${url}: ${getErrorMessage(err)}`, err);
        summary.failed.push({ url, error: getErrorMessage(err) });
        await sleep(delayMs);
        continue;
      }
      filePath = path.join(folder, `img_${index}.jpg`);
    } else {
      bytes = image.bytes;
      filePath = path.join(folder, `img_${index}${KEPT_EXTENSIONS.has(ext) ? ext : ".jpg"}`);
    }

    fs.writeFileSync(filePath, bytes);
    summary.saved.push(filePath);
    await sleep(delayMs);
  }

  return summary;
}

async function fetchImage(url: string, http: AxiosInstance): Promise<FetchedImage> {
  const response = await http.get<ArrayBuffer>(url, { responseType: "arraybuffer" });
  const contentType = response.headers["content-type"];
  return {
    bytes: Buffer.from(response.data),
    contentType: typeof contentType === "string" ? contentType.toLowerCase() : "",
  };
}

/** Decode any format sharp reads and re-encode as baseline RGB JPEG */
export function toJpeg(input: Buffer): Promise<Buffer> {
  return sharp(input).flatten().jpeg({ quality: JPEG_QUALITY }).toBuffer();
}
