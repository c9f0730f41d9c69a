/**
 * Users Service
 * =============
 * Profile and avatar operations for the authenticated user.
 */

import { createHash } from "node:crypto";

import type { AvatarHost } from "../../shared/avatar-host.js";
import type { UserStore } from "./users.repository.js";
import { avatarUploadSchema, type User } from "./users.schemas.js";
import { parseWith } from "../../shared/validation.js";

/**
 * Default avatar assigned at signup.
 */
export function gravatarUrl(email: string): string {
  const hash = createHash("md5").update(email.trim().toLowerCase(), "utf8").digest("hex");
  return `https://www.gravatar.com/avatar/${hash}`;
}

export function avatarPublicId(user: User): string {
  return `cloud_store/${user.email}`;
}

export type UsersService = ReturnType<typeof createUsersService>;

export function createUsersService(deps: { users: UserStore; avatars: AvatarHost }) {
  return {
    async updateAvatar(user: User, upload: { contentType: string | undefined; bytes: unknown }): Promise<User> {
      const { contentType, bytes } = parseWith(avatarUploadSchema, upload, "avatar");
      const url = await deps.avatars.upload(avatarPublicId(user), bytes, contentType);
      return deps.users.setAvatar(user, url);
    },
  };
}
