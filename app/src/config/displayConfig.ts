import type { DisplayConfig } from '@amarre/shared';

export const DEFAULT_DISPLAY_CONFIG: DisplayConfig = {
  width: 1280,
  height: 720,
  frameRate: 60,
  fullscreen: false,
  caption: 'Amarre',
};

function parsePositiveInt(value: string | null, fallback: number): number {
  if (value === null || !/^\d+$/.test(value.trim())) return fallback;
  const parsed = Number.parseInt(value, 10);
  return parsed > 0 ? parsed : fallback;
}

function isFlagSet(params: URLSearchParams, name: string): boolean {
  if (!params.has(name)) return false;
  const value = params.get(name)?.toLowerCase() ?? '';
  return value === '' || value === '1' || value === 'true';
}

/**
 * Read the display settings from a query string such as
 * `?width=1024&height=768&fps=30&fullscreen`.
 *
 * Sizes and fps must be positive integers; anything else keeps the default.
 * `windowed` wins over `fullscreen` when both are given.
 */
export function parseDisplayConfig(search: string): DisplayConfig {
  const params = new URLSearchParams(search);
  const caption = params.get('caption')?.trim();

  return {
    width: parsePositiveInt(params.get('width'), DEFAULT_DISPLAY_CONFIG.width),
    height: parsePositiveInt(
      params.get('height'),
      DEFAULT_DISPLAY_CONFIG.height,
    ),
    frameRate: parsePositiveInt(
      params.get('fps'),
      DEFAULT_DISPLAY_CONFIG.frameRate,
    ),
    fullscreen: isFlagSet(params, 'fullscreen') && !isFlagSet(params, 'windowed'),
    caption: caption ? caption : DEFAULT_DISPLAY_CONFIG.caption,
  };
}
