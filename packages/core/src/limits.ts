/**
 * Deployment Limits
 * 
 * Defaults for the public deployment. Nothing in the engine reads these
 * directly; callers pass the values they want as options.
 */

export interface ExtractionLimits {
  maxChapters: number;
  maxDescriptionLength: number;
  maxLines: number;
  fallbackWindowSeconds: number;
  maxSegmentDuration: number;
  maxVideoDuration: number;
  maxFileSizeMb: number;
}

export const DEFAULT_LIMITS: Readonly<ExtractionLimits> = {
  maxChapters: 20,
  maxDescriptionLength: 50000,
  maxLines: 200,
  fallbackWindowSeconds: 60,
  maxSegmentDuration: 1800, // 30 minutes
  maxVideoDuration: 3600, // 1 hour
  maxFileSizeMb: 500,
};
