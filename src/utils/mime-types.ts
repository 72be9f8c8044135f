/**
 * MIME Type Utilities
 */

/**
 * Video MIME types mapped from file extensions
 */
const VIDEO_MIME_TYPES: Record<string, string> = {
  mp4: 'video/mp4',
  m4v: 'video/mp4',
  mov: 'video/quicktime',
  avi: 'video/x-msvideo',
  mkv: 'video/x-matroska',
  webm: 'video/webm',
  mpeg: 'video/mpeg',
  mpg: 'video/mpeg',
};

/**
 * Image MIME types accepted as observation images
 */
const IMAGE_MIME_TYPES: Record<string, string> = {
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  png: 'image/png',
  webp: 'image/webp',
};

/**
 * Get file extension from path (lowercase, without dot)
 */
function getExtension(filePath: string): string {
  const base = filePath.toLowerCase().split(/[\\/]/).pop() ?? '';
  const dot = base.lastIndexOf('.');
  return dot > 0 ? base.slice(dot + 1) : '';
}

/**
 * Get MIME type for a video file
 * @param defaultType - Returned when the extension is not recognized
 */
export function getVideoMimeType(filePath: string, defaultType = 'video/mp4'): string {
  const ext = getExtension(filePath);
  return Object.hasOwn(VIDEO_MIME_TYPES, ext) ? VIDEO_MIME_TYPES[ext] : defaultType;
}

/**
 * Get MIME type for an image file
 * @param defaultType - Returned when the extension is not recognized
 */
export function getImageMimeType(filePath: string, defaultType = 'image/jpeg'): string {
  const ext = getExtension(filePath);
  return Object.hasOwn(IMAGE_MIME_TYPES, ext) ? IMAGE_MIME_TYPES[ext] : defaultType;
}

export function isSupportedVideo(filePath: string): boolean {
  return Object.hasOwn(VIDEO_MIME_TYPES, getExtension(filePath));
}

export function isSupportedImage(filePath: string): boolean {
  return Object.hasOwn(IMAGE_MIME_TYPES, getExtension(filePath));
}
