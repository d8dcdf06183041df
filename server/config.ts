/**
 * Server configuration from environment variables.
 * Unset values fall back to defaults; invalid numbers throw ValidationError.
 */

import path from "node:path";
import { ValidationError } from "../domain/errors.js";
import { DEFAULT_HOST } from "./webServer.js";
import { DEFAULT_MAX_FILE_SIZE } from "./fsFileSource.js";

export interface ServerConfig {
  host: string;
  port: number;
  rootDir: string;
  maxFileSize: number;
  secure: boolean;
}

export const DEFAULT_PORT = 8_080;

type Env = Record<string, string | undefined>;

function readInt(env: Env, name: string, fallback: number, min: number, max: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw.trim());
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new ValidationError(`${name} must be an integer in [${min}, ${max}]`, { name, value: raw });
  }
  return value;
}

function readFlag(env: Env, name: string): boolean {
  const raw = env[name]?.trim().toLowerCase();
  return raw === "1" || raw === "true" || raw === "yes";
}

export function loadConfig(env: Env = process.env, cwd: string = process.cwd()): ServerConfig {
  return {
    host: env.FIXTURE_HTTP_HOST?.trim() || DEFAULT_HOST,
    port: readInt(env, "FIXTURE_HTTP_PORT", DEFAULT_PORT, 0, 65_535),
    rootDir: path.resolve(cwd, env.FIXTURE_HTTP_ROOT ?? "."),
    maxFileSize: readInt(env, "FIXTURE_HTTP_MAX_FILE_SIZE", DEFAULT_MAX_FILE_SIZE, 0, Number.MAX_SAFE_INTEGER),
    secure: readFlag(env, "FIXTURE_HTTP_SECURE"),
  };
}
