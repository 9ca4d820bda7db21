import type { BoundingBox, Locator } from '@/types/perception'

export interface FrameGeometry {
  frameWidth: number
  horizontalFovDeg: number
}

function center(box: BoundingBox): { x: number; y: number } {
  return { x: box.x + box.width / 2, y: box.y + box.height / 2 }
}

function contains(box: BoundingBox, point: { x: number; y: number }): boolean {
  return point.x >= box.x && point.x <= box.x + box.width
    && point.y >= box.y && point.y <= box.y + box.height
}

export function azimuthOf(locator: Locator, frame: FrameGeometry): number {
  if (locator.kind === 'direction') return locator.azimuthDeg
  const cx = center(locator).x
  return (cx / frame.frameWidth - 0.5) * frame.horizontalFovDeg
}

/**
 * Distance between two locators in image pixels.
 *
 * Boxes: 0 when either centre lies inside the other box (a face inside a
 * body), otherwise the distance between centres. Anything involving a
 * direction compares azimuths and converts degrees to pixels.
 */
export function locatorDistance(a: Locator, b: Locator, frame: FrameGeometry): number {
  if (a.kind === 'bbox' && b.kind === 'bbox') {
    const ca = center(a)
    const cb = center(b)
    if (contains(a, cb) || contains(b, ca)) return 0
    return Math.hypot(ca.x - cb.x, ca.y - cb.y)
  }
  const pxPerDeg = frame.frameWidth / frame.horizontalFovDeg
  return Math.abs(azimuthOf(a, frame) - azimuthOf(b, frame)) * pxPerDeg
}
