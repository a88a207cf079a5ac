// Per-provider capability profiles and the extension allow-list
import { fallbackWarning, type ConversionFallbackWarning, type JsonValue } from "../canonical.js";

export interface ProviderProfile {
  name: string;
  /** Extension keys that may be forwarded to this provider */
  allowedExtensions: readonly string[];
  supportsVision: boolean;
  /** Inline image media types the provider accepts */
  imageMediaTypes: readonly string[];
}

/** Request fields the converter owns; an allow-list may never let an extension overwrite them */
export const RESERVED_PROVIDER_FIELDS: readonly string[] = [
  "model",
  "messages",
  "tools",
  "tool_choice",
  "parallel_tool_calls",
  "stream",
  "stream_options",
  "max_tokens",
  "temperature",
  "top_p",
  "stop",
];

export const DEFAULT_IMAGE_MEDIA_TYPES: readonly string[] = ["image/jpeg", "image/png", "image/gif", "image/webp"];

/** Profile used when the configured provider has no entry in the profiles file */
export function fallbackProfile(name: string): ProviderProfile {
  return { name, allowedExtensions: [], supportsVision: true, imageMediaTypes: DEFAULT_IMAGE_MEDIA_TYPES };
}

/**
 * Split extensions into the allow-listed ones (sorted by key so output is byte-stable)
 * and warnings for everything dropped.
 */
export function filterExtensions(
  extensions: Readonly<Record<string, JsonValue>>,
  profile: ProviderProfile,
): { allowed: Array<[string, JsonValue]>; warnings: ConversionFallbackWarning[] } {
  const allowList = new Set(profile.allowedExtensions.filter((k) => !RESERVED_PROVIDER_FIELDS.includes(k)));
  const allowed: Array<[string, JsonValue]> = [];
  const warnings: ConversionFallbackWarning[] = [];
  for (const key of Object.keys(extensions).sort()) {
    if (allowList.has(key)) {
      allowed.push([key, extensions[key]]);
    } else {
      warnings.push(fallbackWarning(`extensions.${key}`, `parameter "${key}" is not allowed for provider ${profile.name}; dropped`));
    }
  }
  return { allowed, warnings };
}
