/**
 * Authentication token for the investigation daemon
 */

import fs from "node:fs/promises";
import path from "node:path";
import crypto from "node:crypto";
import { getConfigDir } from "../config/loader.js";

/** Token file name */
const TOKEN_FILE = "daemon-token";

/** Token length in bytes (32 bytes = 256 bits) */
const TOKEN_LENGTH = 32;

/**
 * Generate a new random token
 */
export function generateToken(): string {
  return crypto.randomBytes(TOKEN_LENGTH).toString("base64url");
}

/**
 * Get the path to the token file
 */
export function getTokenPath(): string {
  return path.join(getConfigDir(), TOKEN_FILE);
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Load the daemon token, or null if none has been created
 */
export async function loadToken(): Promise<string | null> {
  try {
    const content = await fs.readFile(getTokenPath(), "utf-8");
    return content.trim() || null;
  } catch (error) {
    if (isMissingFile(error)) {
      return null;
    }
    throw error;
  }
}

/**
 * Save the daemon token, readable by the owner only
 */
export async function saveToken(token: string): Promise<void> {
  await fs.mkdir(getConfigDir(), { recursive: true });
  await fs.writeFile(getTokenPath(), token + "\n", { mode: 0o600 });
}

/**
 * Load the existing token or create one
 */
export async function getOrCreateToken(): Promise<string> {
  const existing = await loadToken();
  if (existing) {
    return existing;
  }

  const token = generateToken();
  await saveToken(token);
  return token;
}

/**
 * Replace the token with a new one
 */
export async function regenerateToken(): Promise<string> {
  const token = generateToken();
  await saveToken(token);
  return token;
}

/**
 * Constant-time token comparison
 */
export function tokensMatch(provided: string, expected: string): boolean {
  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  return a.length === b.length && crypto.timingSafeEqual(a, b);
}
