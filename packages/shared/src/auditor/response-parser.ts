/**
 * Model Reply Parsing
 *
 * Models wrap JSON in prose and markdown fences more often than not. These
 * helpers dig the JSON object out of the reply text.
 */

import { MalformedResponseError, describeError } from '../errors';
import type { JsonValue } from '../types';

export type JsonObject = { [key: string]: JsonValue };

/** Block explicitly tagged as JSON; an unclosed fence runs to the end of the reply */
const JSON_FENCE_PATTERN = /```json\s*([\s\S]*?)(?:```|$)/i;

/** Any fenced block, language tag dropped */
const ANY_FENCE_PATTERN = /```[\w-]*[ \t]*\n?([\s\S]*?)(?:```|$)/;

export function isJsonObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Strip markdown fences from a model reply.
 * Prefers a ```json block, then the first fenced block, then the whole reply.
 */
export function unwrapJsonBlock(reply: string): string {
  const content = reply.trim();

  const tagged = content.match(JSON_FENCE_PATTERN);
  if (tagged) {
    return tagged[1].trim();
  }

  const fenced = content.match(ANY_FENCE_PATTERN);
  if (fenced) {
    return fenced[1].trim();
  }

  return content;
}

/**
 * Slice from the first "{" to the last "}", or null when there is no such span
 */
function sliceOutermostObject(text: string): string | null {
  const start = text.indexOf('{');
  const end = text.lastIndexOf('}');
  if (start === -1 || end <= start) {
    return null;
  }
  const slice = text.slice(start, end + 1);
  return slice === text ? null : slice;
}

function parseJson(text: string): JsonValue {
  try {
    return JSON.parse(text);
  } catch (error) {
    const braced = sliceOutermostObject(text);
    if (braced === null) {
      throw new MalformedResponseError(`Model reply is not valid JSON: ${describeError(error)}`);
    }
    try {
      return JSON.parse(braced);
    } catch (innerError) {
      throw new MalformedResponseError(
        `Model reply is not valid JSON: ${describeError(innerError)}`
      );
    }
  }
}

/**
 * Parse a model reply into the audit payload object.
 * Throws MalformedResponseError when the reply holds no JSON object.
 */
export function parseAuditPayload(reply: string): JsonObject {
  const unwrapped = unwrapJsonBlock(reply);
  if (!unwrapped) {
    throw new MalformedResponseError('Empty response from model');
  }

  const parsed = parseJson(unwrapped);
  if (!isJsonObject(parsed)) {
    const actual = Array.isArray(parsed) ? 'array' : parsed === null ? 'null' : typeof parsed;
    throw new MalformedResponseError(`Expected a JSON object from model, got ${actual}`);
  }

  return parsed;
}
