import type { AppConfig } from '../config.js'
import type { InteractiveElement, StateSnapshot } from '../device/types.js'

export type ContextLimits = AppConfig['runner']['context']

export type PreviousStep = {
  step: number
  action: string
  error: string
}

export type StepContextInput = {
  goal: string
  step: number
  maxSteps: number
  parameters: Record<string, unknown>
  previous: PreviousStep | null
  snapshot: StateSnapshot
  limits: ContextLimits
}

export const TRUNCATION_MARKER = '... [truncated]'

const formatValue = (value: unknown): string =>
  typeof value === 'string' ? value : JSON.stringify(value)

const labelOf = (element: InteractiveElement): string =>
  (element.text || element.contentDesc).trim()

export const truncateUiDump = (dump: string, limit: number): string => {
  if (dump.length <= limit) return dump
  return `${dump.slice(0, limit)}\n${TRUNCATION_MARKER}`
}

const renderLabeled = (elements: InteractiveElement[]): string[] =>
  elements.map((element, index) => {
    const kind = element.clickable ? 'clickable' : 'text-only'
    const id = element.resourceId ? ` (id=${element.resourceId})` : ''
    return ` [${index}] "${labelOf(element)}" at (${element.centerX}, ${element.centerY}) - ${kind}${id}`
  })

const renderUnlabeled = (elements: InteractiveElement[]): string[] =>
  elements.map((element, index) => {
    const { left, top, right, bottom } = element.bounds
    const id = element.resourceId || 'unknown'
    const className = element.className || 'unknown'
    return `  [u${index}] id=${id} class=${className} at (${element.centerX}, ${element.centerY}) bounds=(${left},${top})-(${right},${bottom})`
  })

export const renderStepContext = (input: StepContextInput): string => {
  const { snapshot, limits } = input
  const lines: string[] = [
    '## Task Context',
    `Task: ${input.goal}`,
    `Step: ${input.step} of ${input.maxSteps}`,
  ]

  const parameterEntries = Object.entries(input.parameters)
  if (parameterEntries.length > 0) {
    lines.push('', '### Parameters')
    for (const [key, value] of parameterEntries)
      lines.push(`- ${key}: ${formatValue(value)}`)
  }

  if (input.previous) {
    lines.push(
      '',
      '### Previous Step',
      `Step ${input.previous.step} (${input.previous.action}) failed: ${input.previous.error}`,
    )
  }

  lines.push('', '## Screen State')
  lines.push(`Total elements on screen: ${snapshot.elementCount}`)
  if (snapshot.dominantPackage)
    lines.push(`Dominant package on screen: ${snapshot.dominantPackage}`)

  if (snapshot.elements.length > 0) {
    const labeled = snapshot.elements.filter((element) => labelOf(element))
    const unlabeled = snapshot.elements.filter(
      (element) => !labelOf(element) && element.clickable,
    )
    lines.push('', `### Interactive Elements (${snapshot.elements.length} total)`)
    if (labeled.length > 0) {
      lines.push(`Labeled elements (up to ${limits.maxLabeledElements}):`)
      lines.push(...renderLabeled(labeled.slice(0, limits.maxLabeledElements)))
    }
    if (unlabeled.length > 0 && limits.maxUnlabeledElements > 0) {
      lines.push(
        '',
        `Unlabeled clickable elements (up to ${limits.maxUnlabeledElements}):`,
      )
      lines.push(
        ...renderUnlabeled(unlabeled.slice(0, limits.maxUnlabeledElements)),
      )
    }
  }

  if (snapshot.uiDump) {
    const truncated = snapshot.uiDump.length > limits.maxUiDumpChars
    lines.push('', truncated ? '### UI Dump (truncated)' : '### UI Dump')
    lines.push(truncateUiDump(snapshot.uiDump, limits.maxUiDumpChars))
  }

  lines.push(
    '',
    '## Your Response',
    'Respond with a JSON object containing:',
    '- action: tap|type|swipe|press_key|wait|done|error',
    '- params: {x, y} for tap, {text} for type, {direction} for swipe, {key} for press_key, {seconds} for wait',
    '- done: true if the task is complete',
    '- reasoning: your thought process',
  )
  return lines.join('\n')
}
