import { describe, expect, it } from '@jest/globals'
import { ContourAssembler } from '../../src/contours/assembler'
import { Contour } from '../../src/contours/contour'
import { countRepeats, exciseLoops, exciseQuick } from '../../src/contours/excision'
import { edgesOf, ev, pt } from '../helpers'

// Figure-eight pieces: a chain that runs through x twice.
const a1 = pt(0, 0)
const a2 = pt(1, 0)
const x = pt(2, 0)
const b = pt(3, 1)
const c = pt(3, -1)
const d = pt(4, 0)

// Two independent self-touches on one path.
const twoTouches = [
  pt(0, 0),
  pt(1, 0),
  pt(2, 1),
  pt(2, -1),
  pt(1, 0),
  pt(3, 0),
  pt(4, 0),
  pt(5, 1),
  pt(5, -1),
  pt(4, 0),
  pt(6, 0)
]

describe('Loop excision', () => {
  describe('countRepeats', () => {
    it('should not count the closing point of a loop', () => {
      expect(countRepeats([a1, a2, x, a1])).toBe(0)
    })

    it('should count every revisit', () => {
      expect(countRepeats([a1, x, b, x, c, x])).toBe(2)
      expect(countRepeats(twoTouches)).toBe(2)
    })
  })

  describe('Quick excision', () => {
    it('should split an assembled figure-eight into a loop and a chain', () => {
      const assembler = new ContourAssembler({ quickExcision: true })
      assembler.addAll([
        ev(0.5, a1, a2),
        ev(0.5, a2, x),
        ev(0.5, x, b),
        ev(0.5, b, c),
        ev(0.5, c, x),
        ev(0.5, x, d)
      ])
      expect(assembler.contoursAt(0.5)[0].points()).toEqual([d, x, c, b, x, a2, a1])

      const paths = assembler.finish().get(0.5)

      expect(paths).toEqual([
        { level: 0.5, closed: true, points: [x, c, b, x] },
        { level: 0.5, closed: false, points: [d, x, a2, a1] }
      ])
    })

    it('should excise a single self-touch from a closed contour', () => {
      const e = pt(1, -1)
      const contour = Contour.fromPoints([a1, a2, x, b, c, x, e, a1], 1)

      const pieces = exciseLoops(contour, true)

      expect(pieces.map((p) => p.points())).toEqual([
        [x, b, c, x],
        [a1, a2, x, e, a1]
      ])
      expect(pieces.every((p) => p.isLoop())).toBe(true)
    })

    it('should not apply when the revisited point is where the path starts', () => {
      expect(exciseQuick([a1, a2, x, a1, b, c], 1)).toBeUndefined()
    })

    it('should fall back to the cycle search when quick excision does not apply', () => {
      const contour = Contour.fromPoints([a1, a2, x, a1, b, c], 1)

      const pieces = exciseLoops(contour, true)

      expect(pieces.map((p) => p.points())).toEqual([
        [a1, a2, x, a1],
        [a1, b, c]
      ])
    })
  })

  describe('General excision', () => {
    it('should emit two loops and the residual chain for two self-touches', () => {
      const contour = Contour.fromPoints(twoTouches, 3)

      const pieces = exciseLoops(contour, true)

      expect(pieces.map((p) => p.points())).toEqual([
        [pt(1, 0), pt(2, 1), pt(2, -1), pt(1, 0)],
        [pt(4, 0), pt(5, 1), pt(5, -1), pt(4, 0)],
        [pt(0, 0), pt(1, 0), pt(3, 0), pt(4, 0), pt(6, 0)]
      ])
      expect(pieces.map((p) => p.isLoop())).toEqual([true, true, false])
      expect(pieces.every((p) => p.z === 3)).toBe(true)
    })

    it('should match quick excision on a single self-touch', () => {
      const points = [d, x, c, b, x, a2, a1]

      const quick = exciseLoops(Contour.fromPoints(points, 1), true)
      const full = exciseLoops(Contour.fromPoints(points, 1), false)

      expect(full.map((p) => p.points())).toEqual(quick.map((p) => p.points()))
    })

    it('should split a closed contour pinched at its start into two loops', () => {
      const e = pt(-1, 1)
      const f = pt(-1, -1)
      const contour = Contour.fromPoints([a1, a2, x, a1, e, f, a1], 1)

      const pieces = exciseLoops(contour, false)

      expect(pieces.map((p) => p.points())).toEqual([
        [a1, a2, x, a1],
        [a1, e, f, a1]
      ])
    })

    it('should give an edge shared by two elementary cycles to only one loop', () => {
      const [s0, s1, s2, s3] = [pt(0, 0), pt(1, 0), pt(1, 1), pt(0, 1)]
      const points = [s0, s1, s2, s0, s3, s2]

      const pieces = exciseLoops(Contour.fromPoints(points, 1), true)

      expect(pieces.map((p) => p.points())).toEqual([
        [s0, s1, s2, s0],
        [s0, s3, s2]
      ])
      expect(edgesOf(pieces.map((p) => p.points()))).toEqual(edgesOf([points]))
    })

    it('should excise a contour tens of thousands of points long', () => {
      const line = Array.from({ length: 30000 }, (_, i) => pt(i, 0))
      const points = [...line, pt(10, 0), pt(20, 0)]

      const pieces = exciseLoops(Contour.fromPoints(points, 1), true)

      expect(pieces).toHaveLength(2)
      expect(pieces[0].isLoop()).toBe(true)
      expect(pieces[0].points()).toEqual([...line.slice(10), pt(10, 0)])
      expect(pieces[1].points()).toEqual([...line.slice(0, 11), pt(20, 0)])
      expect(edgesOf(pieces.map((p) => p.points()))).toEqual(edgesOf([points]))
    })
  })

  describe('Invariants', () => {
    it('should leave a contour without revisits untouched', () => {
      const contour = Contour.fromPoints([a1, a2, x, b], 1)

      expect(exciseLoops(contour, true)).toEqual([contour])
      expect(exciseLoops(contour, true)[0]).toBe(contour)
    })

    it('should be a no-op on its own output', () => {
      for (const quick of [true, false]) {
        const pieces = exciseLoops(Contour.fromPoints(twoTouches, 1), quick)

        for (const piece of pieces) {
          const again = exciseLoops(piece, quick)
          expect(again).toHaveLength(1)
          expect(again[0]).toBe(piece)
        }
      }
    })

    it('should regroup edges without creating or losing any', () => {
      const figureEight = [d, x, c, b, x, a2, a1]

      for (const points of [twoTouches, figureEight]) {
        const pieces = exciseLoops(Contour.fromPoints(points, 1), true)

        expect(edgesOf(pieces.map((p) => p.points()))).toEqual(edgesOf([points]))
      }
    })

    it('should close every loop it emits', () => {
      const pieces = exciseLoops(Contour.fromPoints(twoTouches, 1), true)
      const loops = pieces.filter((p) => p.isLoop())

      expect(loops).toHaveLength(2)
      for (const loop of loops) {
        expect(loop.front()).toEqual(loop.back())
      }
    })
  })
})
