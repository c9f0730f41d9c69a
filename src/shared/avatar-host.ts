/**
 * Avatar Host
 * ===========
 * Uploads avatar images to Cloudinary and returns a 250x250 cropped URL.
 *
 * Uses the signed upload endpoint directly:
 *   POST https://api.cloudinary.com/v1_1/<cloud>/image/upload
 * The signature is sha1 over the sorted, `&`-joined upload params followed by
 * the API secret.
 */

import { createHash } from "node:crypto";

import axios from "axios";
import { z } from "zod";

import type { CloudinaryConfig } from "../config/env.js";
import { ConfigurationError, ExternalApiError } from "./errors.js";
import { logger } from "./logger.js";

export interface AvatarHost {
  upload(publicId: string, bytes: Buffer, contentType: string): Promise<string>;
}

const AVATAR_SIZE = 250;
const UPLOAD_TIMEOUT_MS = 30_000;

const uploadResponseSchema = z.object({
  public_id: z.string(),
  version: z.number(),
});

export function signUploadParams(params: Record<string, string>, apiSecret: string): string {
  const toSign = Object.keys(params)
    .sort()
    .map((k) => `${k}=${params[k]}`)
    .join("&");
  return createHash("sha1").update(toSign + apiSecret, "utf8").digest("hex");
}

export function buildAvatarUrl(cloudName: string, publicId: string, version: number): string {
  const transform = `c_fill,h_${AVATAR_SIZE},w_${AVATAR_SIZE}`;
  const encodedId = publicId.split("/").map(encodeURIComponent).join("/");
  return `https://res.cloudinary.com/${cloudName}/image/upload/${transform}/v${version}/${encodedId}`;
}

export function createCloudinaryAvatarHost(config: CloudinaryConfig | null): AvatarHost {
  return {
    async upload(publicId, bytes, contentType) {
      if (!config) {
        throw new ConfigurationError("CLOUDINARY_NAME, CLOUDINARY_API_KEY and CLOUDINARY_API_SECRET are required");
      }

      const signed: Record<string, string> = {
        overwrite: "true",
        public_id: publicId,
        timestamp: String(Math.floor(Date.now() / 1000)),
      };

      const form = new URLSearchParams({
        ...signed,
        api_key: config.apiKey,
        signature: signUploadParams(signed, config.apiSecret),
        file: `data:${contentType};base64,${bytes.toString("base64")}`,
      });

      try {
        const response = await axios.post<unknown>(
          `https://api.cloudinary.com/v1_1/${config.cloudName}/image/upload`,
          form,
          { timeout: UPLOAD_TIMEOUT_MS }
        );
        const uploaded = uploadResponseSchema.parse(response.data);
        logger.info("Avatar uploaded", { publicId: uploaded.public_id, version: uploaded.version });
        return buildAvatarUrl(config.cloudName, uploaded.public_id, uploaded.version);
      } catch (err: unknown) {
        const message = axios.isAxiosError(err) ? err.message : err instanceof Error ? err.message : String(err);
        throw new ExternalApiError("Cloudinary", message, err);
      }
    },
  };
}
