import { existsSync } from 'node:fs'
import { dirname, isAbsolute, join, relative, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'

import read from 'fire-keeper/read'

import { logSafeError } from '../log/safe.js'

const ROOT_CANDIDATES = ['../../prompts/', '../../../prompts/'].map(
  (relativePath) => fileURLToPath(new URL(relativePath, import.meta.url)),
)

export const PROMPTS_ROOT =
  ROOT_CANDIDATES.find((path) => existsSync(path)) ??
  ROOT_CANDIDATES[0] ??
  'prompts'

const TEMPLATE_NAME = /^[a-z0-9][a-z0-9_-]*$/i

export const FALLBACK_BASE_PROMPT = [
  'You are controlling an Android phone via accessibility commands.',
  'Analyze the screen state and decide the next action to complete the task.',
  'Respond with JSON: {"action": "tap|type|swipe|press_key|wait|done|error", "params": {}, "done": boolean, "reasoning": "..."}',
].join('\n')

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'ENOENT'

const readPromptByPath = async (
  path: string,
  allowMissing: boolean,
): Promise<string | null> => {
  try {
    const content = await read(path, { raw: true, echo: false })
    if (!content) return ''
    if (Buffer.isBuffer(content)) return content.toString('utf8')
    return typeof content === 'string' ? content : ''
  } catch (error) {
    if (isMissingFile(error)) {
      if (allowMissing) return null
      throw new Error(`prompt_include_not_found:${path}`)
    }
    await logSafeError('readPromptByPath', error, { meta: { path } })
    throw error
  }
}

const normalizeIncludePath = (
  root: string,
  currentPath: string,
  includePath: string,
): string => {
  const trimmed = includePath.trim()
  if (!trimmed) throw new Error('prompt_include_path_empty')
  const withExt = trimmed.endsWith('.md') ? trimmed : `${trimmed}.md`
  if (isAbsolute(withExt))
    throw new Error(`prompt_include_absolute_path:${trimmed}`)
  const resolvedInclude = resolve(dirname(currentPath), withExt)
  const relativeInclude = relative(root, resolvedInclude)
  if (relativeInclude.startsWith('..') || isAbsolute(relativeInclude))
    throw new Error(`prompt_include_outside_root:${trimmed}`)
  return resolvedInclude
}

/** Reads a prompt file and expands `{#include path}` directives under `root`. */
const expandPromptIncludes = async (
  root: string,
  path: string,
  includeStack: string[],
): Promise<string | null> => {
  if (includeStack.includes(path)) {
    throw new Error(
      `prompt_include_cycle:${[...includeStack, path]
        .map((current) => relative(root, current))
        .join(' -> ')}`,
    )
  }
  const content = await readPromptByPath(path, includeStack.length === 0)
  if (content === null) return null
  const nextStack = [...includeStack, path]
  let output = ''
  let cursor = 0
  const includeRe = /\{#include\s+([^}\s]+)\s*\}/g
  let match = includeRe.exec(content)
  while (match) {
    output += content.slice(cursor, match.index)
    const includeRef = match.at(1)
    if (!includeRef) throw new Error('prompt_include_path_empty')
    const includePath = normalizeIncludePath(root, path, includeRef)
    output += (await expandPromptIncludes(root, includePath, nextStack)) ?? ''
    cursor = match.index + match[0].length
    match = includeRe.exec(content)
  }
  output += content.slice(cursor)
  return output
}

export const loadBasePrompt = async (root = PROMPTS_ROOT): Promise<string> => {
  const content = await expandPromptIncludes(root, join(root, 'base.md'), [])
  const trimmed = content?.trim()
  return trimmed ? trimmed : FALLBACK_BASE_PROMPT
}

export const loadTaskTemplate = async (
  name: string,
  root = PROMPTS_ROOT,
): Promise<string | null> => {
  const trimmed = name.trim()
  if (!TEMPLATE_NAME.test(trimmed)) return null
  const content = await expandPromptIncludes(
    root,
    join(root, 'tasks', `${trimmed}.md`),
    [],
  )
  const normalized = content?.trim()
  return normalized ? normalized : null
}

const escapeRegExp = (value: string): string =>
  value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&')

const stringifyParameter = (value: unknown): string =>
  typeof value === 'string' ? value : JSON.stringify(value) ?? String(value)

/** Replaces `{key}`, `{{key}}` and `{{ key }}` with the parameter values. */
export const substituteParameters = (
  template: string,
  parameters: Record<string, unknown>,
): string => {
  let output = template
  for (const [key, value] of Object.entries(parameters)) {
    const pattern = new RegExp(
      `\\{\\{\\s*${escapeRegExp(key)}\\s*\\}\\}|\\{${escapeRegExp(key)}\\}`,
      'g',
    )
    const replacement = stringifyParameter(value)
    output = output.replace(pattern, () => replacement)
  }
  return output
}

export type ResolvedPrompt = {
  systemPrompt: string
  taskPrompt: string
  template: string | null
}

export const resolveTaskPrompt = async (params: {
  goal: string
  parameters: Record<string, unknown>
  root?: string
}): Promise<ResolvedPrompt> => {
  const root = params.root ?? PROMPTS_ROOT
  const base = await loadBasePrompt(root)
  const template = await loadTaskTemplate(params.goal, root)
  const taskPrompt = template
    ? substituteParameters(template, params.parameters)
    : params.goal
  return {
    systemPrompt: `${base}\n\n# Current Task\n\n${taskPrompt}`,
    taskPrompt,
    template: template ? params.goal.trim() : null,
  }
}
