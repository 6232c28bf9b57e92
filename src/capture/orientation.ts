/**
 * Device to capture orientation mapping.
 */

import type { DeviceOrientation, VideoOrientation } from './types.ts';

/**
 * Capture orientation for a device orientation.
 *
 * Landscape is mirrored: the device turned left means the camera sees the
 * scene rotated right. Flat and unknown orientations carry no rotation;
 * they yield portrait until the first orientation change is observed and
 * null (keep the current orientation) afterwards.
 */
export function mapDeviceOrientation(
  device: DeviceOrientation,
  hasChanged: boolean
): VideoOrientation | null {
  switch (device) {
    case 'portrait':
      return 'portrait';
    case 'portrait-upside-down':
      return 'portrait-upside-down';
    case 'landscape-left':
      return 'landscape-right';
    case 'landscape-right':
      return 'landscape-left';
    case 'face-up':
    case 'face-down':
    case 'unknown':
      return hasChanged ? null : 'portrait';
  }
}
