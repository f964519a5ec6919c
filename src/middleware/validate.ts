/**
 * Request body checks shared by the routes (answered as 400)
 */
import type { Request } from 'express';
import { ApiError } from './error.js';

export type Body = Record<string, unknown>;

export function readBody(req: Request): Body {
  const body: unknown = req.body;
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    throw new ApiError(400, 'JSON body is required');
  }
  return Object.fromEntries(Object.entries(body));
}

export function requireString(
  body: Body,
  key: string,
  { allowEmpty = false, maxLength }: { allowEmpty?: boolean; maxLength?: number } = {}
): string {
  const value = body[key];
  if (typeof value !== 'string' || (!allowEmpty && value.trim().length === 0)) {
    throw new ApiError(400, `${key} is required`);
  }
  if (maxLength !== undefined && value.length > maxLength) {
    throw new ApiError(400, `${key} too long (max ${maxLength} characters)`);
  }
  return value;
}

export function optionalString(body: Body, key: string): string | undefined {
  const value = body[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    throw new ApiError(400, `${key} must be a string`);
  }
  return value;
}

export function requireOneOf<T extends string>(body: Body, key: string, allowed: readonly T[], fallback?: T): T {
  const value = body[key] ?? fallback;
  const match = allowed.find((candidate) => candidate === value);
  if (match === undefined) {
    throw new ApiError(400, `${key} must be one of: ${allowed.join(', ')}`);
  }
  return match;
}

export function requireArray(body: Body, key: string): unknown[] {
  const value = body[key];
  if (!Array.isArray(value)) {
    throw new ApiError(400, `${key} must be an array`);
  }
  return value;
}

/**
 * Base64 audio from the client, decoded
 */
export function requireAudio(body: Body): Buffer {
  const audio = body.audio;
  if (!audio) {
    throw new ApiError(400, 'Audio data is required');
  }
  if (typeof audio !== 'string') {
    throw new ApiError(400, 'Audio must be a base64 string');
  }
  const buffer = Buffer.from(audio, 'base64');
  if (buffer.length === 0) {
    throw new ApiError(400, 'Audio must be a base64 string');
  }
  return buffer;
}
