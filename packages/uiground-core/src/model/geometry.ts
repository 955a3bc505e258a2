import type { Bounds, ClipRect, ScreenSize } from './types.js'

export const rectFromBounds = (bounds: Bounds): ClipRect => ({
	x1: bounds.x,
	y1: bounds.y,
	x2: bounds.x + bounds.width,
	y2: bounds.y + bounds.height,
})

export const screenRect = (screen: ScreenSize): ClipRect => ({ x1: 0, y1: 0, x2: screen.width, y2: screen.height })

/** Overlap of two rectangles, or `null` when they only touch or are disjoint. */
export const intersectRects = (a: ClipRect, b: ClipRect): ClipRect | null => {
	const x1 = Math.max(a.x1, b.x1)
	const y1 = Math.max(a.y1, b.y1)
	const x2 = Math.min(a.x2, b.x2)
	const y2 = Math.min(a.y2, b.y2)
	if (x1 < x2 && y1 < y2) {
		return { x1, y1, x2, y2 }
	}
	return null
}

export const rectArea = (rect: ClipRect | null): number => {
	if (!rect) {
		return 0
	}
	return Math.max(0, rect.x2 - rect.x1) * Math.max(0, rect.y2 - rect.y1)
}

/** Edges count as inside. */
export const containsPoint = (rect: ClipRect, point: readonly [number, number]): boolean =>
	point[0] >= rect.x1 && point[0] <= rect.x2 && point[1] >= rect.y1 && point[1] <= rect.y2

export const containsRect = (outer: ClipRect, inner: ClipRect): boolean =>
	inner.x1 >= outer.x1 && inner.y1 >= outer.y1 && inner.x2 <= outer.x2 && inner.y2 <= outer.y2

/**
 * Midpoint of a rectangle.
 * Integer rectangles yield integer (floored) points so click targets stay on the pixel grid.
 */
export const centerOf = (rect: ClipRect): [number, number] => {
	const integral = Number.isInteger(rect.x1) && Number.isInteger(rect.y1) && Number.isInteger(rect.x2) && Number.isInteger(rect.y2)
	const cx = (rect.x1 + rect.x2) / 2
	const cy = (rect.y1 + rect.y2) / 2
	return integral ? [Math.floor(cx), Math.floor(cy)] : [cx, cy]
}

export const rectToTuple = (rect: ClipRect): [number, number, number, number] => [rect.x1, rect.y1, rect.x2, rect.y2]
