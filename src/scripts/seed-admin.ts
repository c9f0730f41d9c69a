/* eslint-disable no-console */
import "dotenv/config";

import { disconnectDb, getPool } from "../shared/db.js";
import { hashPassword } from "../shared/password.js";
import { gravatarUrl } from "../modules/users/users.service.js";

/**
 * Creates (or promotes) a confirmed admin account from ADMIN_EMAIL /
 * ADMIN_PASSWORD. Admins are the only way to reach `/contacts/contacts/all`
 * besides moderators, and signup never grants either role.
 */
async function main() {
  const email = (process.env.ADMIN_EMAIL || "").trim().toLowerCase();
  const password = process.env.ADMIN_PASSWORD || "";
  const username = (process.env.ADMIN_USERNAME || "admin").trim();
  if (!email || password.length < 8) {
    throw new Error("ADMIN_EMAIL and ADMIN_PASSWORD (8+ chars) are required");
  }

  const pool = getPool(process.env.DATABASE_URL);
  const passwordHash = await hashPassword(password);

  await pool.query(
    `INSERT INTO users (username, email, password, avatar, confirmed, role)
     VALUES ($1, $2, $3, $4, TRUE, 'admin')
     ON CONFLICT (email) DO UPDATE
       SET password = EXCLUDED.password, confirmed = TRUE, role = 'admin', updated_at = now()`,
    [username, email, passwordHash, gravatarUrl(email)]
  );

  console.log(`🔐 Admin ready: ${email}`);
}

main()
  .catch((err: unknown) => {
    console.error("❌ Seeding admin failed:", err);
    process.exitCode = 1;
  })
  .finally(() => disconnectDb());
