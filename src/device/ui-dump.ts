import { Parser } from 'htmlparser2'

import type { Bounds, InteractiveElement } from './types.js'

const BOUNDS_PATTERN = /\[(\d+),(\d+)\]\[(\d+),(\d+)\]/

export type UiNode = InteractiveElement

const parseBounds = (value: string | undefined): Bounds => {
  const match = value ? BOUNDS_PATTERN.exec(value) : null
  if (!match) return { left: 0, top: 0, right: 0, bottom: 0 }
  const [left, top, right, bottom] = match.slice(1).map(Number)
  return {
    left: left ?? 0,
    top: top ?? 0,
    right: right ?? 0,
    bottom: bottom ?? 0,
  }
}

const lastSegment = (value: string, separator: string): string => {
  const index = value.lastIndexOf(separator)
  return index >= 0 ? value.slice(index + 1) : value
}

const toNode = (attrs: Record<string, string>): UiNode => {
  const bounds = parseBounds(attrs['bounds'])
  return {
    text: attrs['text'] ?? '',
    contentDesc: attrs['content-desc'] ?? '',
    resourceId: lastSegment(attrs['resource-id'] ?? '', '/'),
    className: lastSegment(attrs['class'] ?? '', '.'),
    packageName: attrs['package'] ?? '',
    clickable: attrs['clickable'] === 'true',
    centerX: Math.floor((bounds.left + bounds.right) / 2),
    centerY: Math.floor((bounds.top + bounds.bottom) / 2),
    bounds,
  }
}

/** Flattens a `uiautomator dump` hierarchy into its `node` elements, in document order. */
export const parseUiNodes = (xml: string): UiNode[] => {
  if (!xml) return []
  const nodes: UiNode[] = []
  const parser = new Parser(
    {
      onopentag: (name, attrs) => {
        if (name === 'node') nodes.push(toNode(attrs))
      },
    },
    { xmlMode: true, decodeEntities: true },
  )
  parser.write(xml)
  parser.end()
  return nodes
}

/** Keeps nodes that can be acted on or read: clickable, or carrying a label. */
export const selectInteractive = (nodes: UiNode[]): InteractiveElement[] =>
  nodes.filter((node) => node.clickable || node.text || node.contentDesc)

export const dominantPackage = (nodes: UiNode[]): string | null => {
  const counts = new Map<string, number>()
  for (const node of nodes) {
    if (!node.packageName) continue
    counts.set(node.packageName, (counts.get(node.packageName) ?? 0) + 1)
  }
  let best: string | null = null
  let bestCount = 0
  for (const [name, count] of counts) {
    if (count > bestCount) {
      best = name
      bestCount = count
    }
  }
  return best
}
