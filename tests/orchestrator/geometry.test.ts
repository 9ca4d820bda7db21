import { describe, it, expect } from 'vitest'
import { azimuthOf, locatorDistance } from '@/lib/orchestrator/geometry'
import { boxAt } from '../test-utils/fixtures'

const frame = { frameWidth: 640, horizontalFovDeg: 57.2 }

describe('azimuthOf', () => {
  it('is zero for a box centred in the frame', () => {
    expect(azimuthOf(boxAt(320, 240), frame)).toBe(0)
  })

  it('is positive to the right of centre', () => {
    expect(azimuthOf(boxAt(480, 240), frame)).toBeCloseTo(14.3)
  })

  it('passes directions through', () => {
    expect(azimuthOf({ kind: 'direction', azimuthDeg: -20 }, frame)).toBe(-20)
  })
})

describe('locatorDistance', () => {
  it('is zero when one box centre lies inside the other box', () => {
    // face box inside a body box
    const body = boxAt(100, 100, 60, 160)
    const face = boxAt(105, 40, 20, 20)
    expect(locatorDistance(face, body, frame)).toBe(0)
  })

  it('measures centre distance between separate boxes', () => {
    expect(locatorDistance(boxAt(100, 100), boxAt(400, 100), frame)).toBe(300)
  })

  it('converts azimuth differences to pixels', () => {
    const a = { kind: 'direction' as const, azimuthDeg: 0 }
    const b = { kind: 'direction' as const, azimuthDeg: 10 }
    expect(locatorDistance(a, b, frame)).toBeCloseTo(6400 / 57.2)
  })

  it('compares a box with a direction by azimuth', () => {
    expect(locatorDistance(boxAt(320, 240), { kind: 'direction', azimuthDeg: 0 }, frame)).toBe(0)
  })
})
