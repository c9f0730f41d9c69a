/**
 * Mailer
 * ======
 * Outbound verification emails over SMTP (nodemailer).
 */

import { readFile } from "node:fs/promises";
import path from "node:path";

import nodemailer, { type Transporter } from "nodemailer";

import type { MailConfig } from "../config/env.js";
import { logger } from "./logger.js";

export interface Mailer {
  sendVerification(toEmail: string, username: string, verifyLink: string): Promise<void>;
}

const EMAIL_TIMEOUT_MS = 10_000;
const TEMPLATE_PATH = path.resolve(process.cwd(), "templates", "verify-email.html");

function escapeHtml(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

export function renderTemplate(template: string, vars: Record<string, string>): string {
  return template.replace(/\{\{\s*(\w+)\s*\}\}/g, (match: string, name: string) => {
    const value = vars[name];
    return value === undefined ? match : escapeHtml(value);
  });
}

export function createSmtpMailer(config: MailConfig): Mailer {
  let transport: Transporter | null = null;
  let template: Promise<string> | null = null;

  function getTransport(): Transporter {
    if (!transport) {
      transport = nodemailer.createTransport({
        host: config.host,
        port: config.port,
        secure: config.secure,
        auth: config.username ? { user: config.username, pass: config.password } : undefined,
        connectionTimeout: EMAIL_TIMEOUT_MS,
        greetingTimeout: EMAIL_TIMEOUT_MS,
        socketTimeout: EMAIL_TIMEOUT_MS,
      });
    }
    return transport;
  }

  function loadTemplate(): Promise<string> {
    if (!template) {
      template = readFile(TEMPLATE_PATH, "utf8").catch((err: unknown) => {
        template = null;
        throw err;
      });
    }
    return template;
  }

  return {
    async sendVerification(toEmail, username, verifyLink) {
      const html = renderTemplate(await loadTemplate(), { username, link: verifyLink });
      const info = await getTransport().sendMail({
        from: { name: config.fromName, address: config.from },
        to: toEmail,
        subject: "Confirm your email",
        html,
        text: `Hi ${username}, confirm your email address: ${verifyLink}`,
      });
      logger.info("Verification email sent", { to: toEmail, messageId: info.messageId });
    },
  };
}
