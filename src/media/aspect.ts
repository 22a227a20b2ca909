/**
 * Target frame shapes and the ffmpeg filter graphs that fill them.
 */
import { ConfigurationError } from '../errors.js';

export const ASPECT_RATIOS = ['9-16', '1-1'] as const;

export type AspectRatio = typeof ASPECT_RATIOS[number];

export interface AspectProfile {
  ratio: AspectRatio;
  width: number;
  height: number;
  /** Width/height as an ffmpeg expression, compared against the source `a`. */
  ratioExpr: string;
}

const PROFILES: Record<AspectRatio, AspectProfile> = {
  '9-16': { ratio: '9-16', width: 1080, height: 1920, ratioExpr: '9/16' },
  '1-1':  { ratio: '1-1',  width: 1080, height: 1080, ratioExpr: '1' },
};

export function isAspectRatio(value: string): value is AspectRatio {
  return ASPECT_RATIOS.some(ratio => ratio === value);
}

export function parseAspectRatio(value: string): AspectRatio {
  const trimmed = value.trim();
  if (!isAspectRatio(trimmed)) {
    throw new ConfigurationError(
      `Unsupported aspect ratio "${value}" (expected one of ${ASPECT_RATIOS.join(', ')})`,
    );
  }
  return trimmed;
}

export function getAspectProfile(ratio: AspectRatio): AspectProfile {
  return PROFILES[ratio];
}

/**
 * Blurred-background fill: one copy is stretched to the canvas and blurred,
 * the other is fitted inside it and overlaid centered.
 */
export function buildFillFilterGraph(ratio: AspectRatio): string {
  const { width: w, height: h, ratioExpr: r } = getAspectProfile(ratio);
  return [
    'split[original][copy]',
    `[copy]scale=${w}:${h},boxblur=luma_radius=min(${w}\\,${h})/20:luma_power=1[blurred]`,
    `[original]scale='if(gt(a,${r}),${w},-2)':'if(gt(a,${r}),-2,${h})'[scaled]`,
    '[blurred][scaled]overlay=(W-w)/2:(H-h)/2,setsar=1',
  ].join(';');
}
