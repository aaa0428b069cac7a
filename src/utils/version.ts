/**
 * Version information for portprobe
 */

// UPDATE THIS for each release
export const VERSION = '0.1.0'

export const PRODUCT_NAME = 'portprobe'

export function versionString(): string {
  return `${PRODUCT_NAME} v${VERSION}`
}
