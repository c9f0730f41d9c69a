/**
 * Users Schemas
 * =============
 * User record, roles and the public user view.
 */

import { z } from "zod";

export const ROLES = ["admin", "moderator", "user"] as const;
export const roleSchema = z.enum(ROLES);
export type Role = z.infer<typeof roleSchema>;

export type User = {
  id: number;
  username: string;
  email: string;
  password: string; // scrypt hash
  avatar: string | null;
  refreshToken: string | null;
  confirmed: boolean;
  role: Role;
  createdAt: Date;
  updatedAt: Date;
};

export type NewUser = {
  username: string;
  email: string;
  password: string;
  avatar: string | null;
};

/**
 * What the API returns for a user: never the hash or the refresh token.
 */
export type UserView = {
  id: number;
  username: string;
  email: string;
  avatar: string | null;
  role: Role;
  confirmed: boolean;
  created_at: string;
};

export function toUserView(user: User): UserView {
  return {
    id: user.id,
    username: user.username,
    email: user.email,
    avatar: user.avatar,
    role: user.role,
    confirmed: user.confirmed,
    created_at: user.createdAt.toISOString(),
  };
}

export const AVATAR_CONTENT_TYPES = ["image/png", "image/jpeg", "image/gif", "image/webp"] as const;

export const avatarUploadSchema = z.object({
  contentType: z.enum(AVATAR_CONTENT_TYPES, {
    errorMap: () => ({ message: "Avatar must be a PNG, JPEG, GIF or WebP image" }),
  }),
  bytes: z
    .instanceof(Buffer)
    .refine((b) => b.length > 0, { message: "Avatar file is empty" }),
});

export type AvatarUpload = z.infer<typeof avatarUploadSchema>;
