export type Bounds = {
  left: number
  top: number
  right: number
  bottom: number
}

export type InteractiveElement = {
  text: string
  contentDesc: string
  resourceId: string
  className: string
  packageName: string
  clickable: boolean
  centerX: number
  centerY: number
  bounds: Bounds
}

export type StateSnapshot = {
  screenshotBase64: string | null
  uiDump: string
  elementCount: number
  elements: InteractiveElement[]
  dominantPackage: string | null
}

export type SwipeDirection = 'up' | 'down' | 'left' | 'right'

export type DevicePrimitive =
  | { kind: 'tap'; x: number; y: number }
  | { kind: 'type'; text: string }
  | { kind: 'swipe'; direction: SwipeDirection }
  | { kind: 'press_key'; key: string }

export type PrimitiveResult = {
  success: boolean
  error: string | null
}

export type DeviceCapability = {
  captureState: (signal?: AbortSignal) => Promise<StateSnapshot>
  applyPrimitive: (
    primitive: DevicePrimitive,
    signal?: AbortSignal,
  ) => Promise<PrimitiveResult>
}

export type DeviceHealth = {
  connected: boolean
  serial: string
  deviceModel: string | null
  androidVersion: string | null
  batteryLevel: number | null
  error: string | null
  checkedAt: string
}

export type DeviceProbe = () => Promise<Omit<DeviceHealth, 'checkedAt'>>
