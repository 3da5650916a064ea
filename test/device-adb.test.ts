import { expect, test } from 'vitest'

import {
  escapeInputText,
  primitiveArgs,
  remoteDumpPath,
  swipeCoordinates,
} from '../src/device/adb.js'
import {
  dominantPackage,
  parseUiNodes,
  selectInteractive,
} from '../src/device/ui-dump.js'

import { testConfig } from './helpers/fakes.js'

const DUMP = [
  '<?xml version="1.0" encoding="UTF-8"?>',
  '<hierarchy rotation="0">',
  '<node index="0" text="" resource-id="" class="android.widget.FrameLayout" package="com.android.settings" content-desc="" clickable="false" bounds="[0,0][1080,2400]">',
  '<node index="0" text="Wi-Fi &amp; network" resource-id="com.android.settings:id/title" class="android.widget.TextView" package="com.android.settings" content-desc="" clickable="true" bounds="[42,300][1038,420]" />',
  '<node index="1" text="" resource-id="com.android.settings:id/search" class="android.widget.ImageButton" package="com.android.settings" content-desc="Search settings" clickable="true" bounds="[900,100][1000,201]" />',
  '<node index="2" text="" resource-id="" class="android.view.View" package="com.android.systemui" content-desc="" clickable="true" bounds="[0,2300][101,2400]" />',
  '</node>',
  '</hierarchy>',
].join('\n')

const settings = testConfig().device

test('parses every node with decoded labels and centres', () => {
  const nodes = parseUiNodes(DUMP)
  expect(nodes).toHaveLength(4)
  expect(nodes[1]).toEqual({
    text: 'Wi-Fi & network',
    contentDesc: '',
    resourceId: 'title',
    className: 'TextView',
    packageName: 'com.android.settings',
    clickable: true,
    centerX: 540,
    centerY: 360,
    bounds: { left: 42, top: 300, right: 1038, bottom: 420 },
  })
  expect(nodes[2]?.centerY).toBe(150)
  expect(nodes[3]?.centerX).toBe(50)
})

test('keeps clickable or labelled nodes and finds the dominant package', () => {
  const nodes = parseUiNodes(DUMP)
  expect(selectInteractive(nodes).map((node) => node.resourceId)).toEqual([
    'title',
    'search',
    '',
  ])
  expect(dominantPackage(nodes)).toBe('com.android.settings')
  expect(dominantPackage([])).toBeNull()
})

test('decodes named and numeric character references in labels', () => {
  const [node] = parseUiNodes(
    '<hierarchy><node text="Caf&#233; &#x2022; Menu" content-desc="Line&#10;two &quot;ok&quot;" class="android.widget.Button" package="com.example.cafe" clickable="true" bounds="[0,0][10,10]" /></hierarchy>',
  )
  expect(node?.text).toBe('Caf\u00e9 \u2022 Menu')
  expect(node?.contentDesc).toBe('Line\ntwo "ok"')
  expect(node?.className).toBe('Button')
})

test('ignores markup other than node elements', () => {
  expect(parseUiNodes('')).toEqual([])
  expect(parseUiNodes('<hierarchy rotation="0"></hierarchy>')).toEqual([])
})

test('gives every ui dump its own remote file', () => {
  expect(remoteDumpPath('abc123')).toBe('/sdcard/droidloop_ui_dump_abc123.xml')
  expect(remoteDumpPath()).not.toBe(remoteDumpPath())
  expect(remoteDumpPath()).toMatch(/^\/sdcard\/droidloop_ui_dump_[0-9a-f]{8}\.xml$/)
})

test('escapes text for adb input', () => {
  expect(escapeInputText(`it's "fine" now`)).toBe(`it\\'s%s\\"fine\\"%snow`)
})

test('builds adb arguments for each primitive', () => {
  expect(primitiveArgs({ kind: 'tap', x: 10.6, y: 20.2 }, settings)).toEqual([
    'shell',
    'input',
    'tap',
    '11',
    '20',
  ])
  expect(primitiveArgs({ kind: 'type', text: 'hi there' }, settings)).toEqual([
    'shell',
    'input',
    'text',
    'hi%sthere',
  ])
  expect(primitiveArgs({ kind: 'swipe', direction: 'up' }, settings)).toEqual([
    'shell',
    'input',
    'swipe',
    '540',
    '1700',
    '540',
    '700',
    '300',
  ])
  expect(primitiveArgs({ kind: 'press_key', key: 'Back' }, settings)).toEqual([
    'shell',
    'input',
    'keyevent',
    'KEYCODE_BACK',
  ])
})

test('unknown keys list the available ones', () => {
  expect(primitiveArgs({ kind: 'press_key', key: 'f13' }, settings)).toEqual({
    error:
      'Unknown key: f13. Available: home, back, enter, recent, volume_up, volume_down, power, tab, delete, search',
  })
})

test('swipe coordinates move away from the direction of travel', () => {
  const swipe = { centerX: 500, centerY: 1000, distance: 200, durationMs: 300 }
  expect(swipeCoordinates('down', swipe)).toEqual([500, 800, 500, 1200])
  expect(swipeCoordinates('left', swipe)).toEqual([700, 1000, 300, 1000])
  expect(swipeCoordinates('right', swipe)).toEqual([300, 1000, 700, 1000])
})
