/**
 * Configuration loader
 *
 * Precedence: defaults < JSON file named by ORCHESTRATOR_CONFIG < environment.
 * The result is validated once; the orchestrator core never reads env itself.
 */

import fs from 'fs'
import { z } from 'zod'
import { ConfigError } from '@/lib/orchestrator/errors'
import { DEFAULT_ORCHESTRATOR_CONFIG, type OrchestratorConfig } from '@/types/config'

const positiveInt = z.number().int().positive()
const fraction = z.number().min(0).max(1)

const configShape = z.object({
  robot: z.object({
    enabled: z.boolean(),
    url: z.string().url(),
  }),
  camera: z.object({
    enabled: z.boolean(),
    frameWidth: positiveInt,
    horizontalFovDeg: z.number().positive().max(180),
  }),
  microphone: z.string().min(1).nullable(),
  tracking: z.object({
    staleAfterMs: positiveInt,
    lostAfterMs: positiveInt,
    matchWindowMs: positiveInt,
    matchDistancePx: z.number().positive(),
    emotionSmoothing: z.number().gt(0).max(1),
  }),
  confidence: z.object({
    person: fraction,
    face: fraction,
    emotion: fraction,
    speech: fraction,
  }),
  dialogue: z.object({
    provider: z.enum(['rasa', 'anthropic']),
    rasaUrl: z.string().url(),
    anthropicApiKey: z.string().min(1).nullable(),
    model: z.string().min(1),
    timeoutMs: positiveInt,
    maxQueuedUtterances: z.number().int().min(0),
  }),
  actuation: z.object({
    timeoutMs: positiveInt,
  }),
  farewellText: z.string().min(1).nullable(),
  tickIntervalMs: positiveInt,
  channelCapacity: positiveInt,
  server: z.object({
    port: z.number().int().min(0).max(65535),
  }),
})

export const orchestratorConfigSchema = configShape.superRefine((config, ctx) => {
  if (config.tracking.lostAfterMs <= config.tracking.staleAfterMs) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['tracking', 'lostAfterMs'],
      message: 'must be greater than tracking.staleAfterMs',
    })
  }
  if (config.dialogue.provider === 'anthropic' && !config.dialogue.anthropicApiKey) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['dialogue', 'anthropicApiKey'],
      message: 'is required when dialogue.provider is "anthropic"',
    })
  }
})

const fileSchema = configShape.deepPartial()

const flag = z.string().trim().toLowerCase().transform((value, ctx) => {
  if (['true', '1', 'yes', 'on'].includes(value)) return true
  if (['false', '0', 'no', 'off'].includes(value)) return false
  ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected a boolean, got "${value}"` })
  return z.NEVER
})
const num = z.coerce.number().finite()

const envSchema = z.object({
  ORCHESTRATOR_CONFIG: z.string().optional(),
  ROBOT_ENABLED: flag.optional(),
  ROBOT_URL: z.string().optional(),
  ROBOT_IP: z.string().optional(),
  ROBOT_PORT: num.optional(),
  CAMERA_ENABLED: flag.optional(),
  CAMERA_FRAME_WIDTH: num.optional(),
  CAMERA_FOV_DEG: num.optional(),
  MICROPHONE: z.string().optional(),
  STALE_AFTER_MS: num.optional(),
  LOST_AFTER_MS: num.optional(),
  MATCH_WINDOW_MS: num.optional(),
  MATCH_DISTANCE_PX: num.optional(),
  EMOTION_SMOOTHING: num.optional(),
  MIN_PERSON_CONFIDENCE: num.optional(),
  MIN_FACE_CONFIDENCE: num.optional(),
  MIN_EMOTION_CONFIDENCE: num.optional(),
  MIN_SPEECH_CONFIDENCE: num.optional(),
  DIALOGUE_PROVIDER: z.string().optional(),
  RASA_URL: z.string().optional(),
  ANTHROPIC_API_KEY: z.string().optional(),
  DIALOGUE_MODEL: z.string().optional(),
  DIALOGUE_TIMEOUT_MS: num.optional(),
  MAX_QUEUED_UTTERANCES: num.optional(),
  ACTUATION_TIMEOUT_MS: num.optional(),
  FAREWELL_TEXT: z.string().optional(),
  TICK_INTERVAL_MS: num.optional(),
  CHANNEL_CAPACITY: num.optional(),
  PORT: num.optional(),
})

type EnvOverrides = z.infer<typeof envSchema>

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}

/** Recursively overlays defined values of `override` onto `base`. */
function mergeDeep(base: object, override: object): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base }
  for (const [key, value] of Object.entries(override)) {
    if (value === undefined) continue
    const current = result[key]
    result[key] = isPlainObject(current) && isPlainObject(value) ? mergeDeep(current, value) : value
  }
  return result
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => issue.path.length > 0 ? `${issue.path.join('.')} ${issue.message}` : issue.message)
}

/** 'none' (any case) or an empty value means no microphone */
function microphoneSetting(value: string | undefined): string | null | undefined {
  if (value === undefined) return undefined
  const trimmed = value.trim()
  return trimmed === '' || trimmed.toLowerCase() === 'none' ? null : trimmed
}

function robotUrl(env: EnvOverrides): string | undefined {
  if (env.ROBOT_URL) return env.ROBOT_URL
  if (!env.ROBOT_IP) return undefined
  return `ws://${env.ROBOT_IP}:${env.ROBOT_PORT ?? 9559}`
}

function overridesFromEnv(env: EnvOverrides): Record<string, unknown> {
  return {
    robot: { enabled: env.ROBOT_ENABLED, url: robotUrl(env) },
    camera: {
      enabled: env.CAMERA_ENABLED,
      frameWidth: env.CAMERA_FRAME_WIDTH,
      horizontalFovDeg: env.CAMERA_FOV_DEG,
    },
    microphone: microphoneSetting(env.MICROPHONE),
    tracking: {
      staleAfterMs: env.STALE_AFTER_MS,
      lostAfterMs: env.LOST_AFTER_MS,
      matchWindowMs: env.MATCH_WINDOW_MS,
      matchDistancePx: env.MATCH_DISTANCE_PX,
      emotionSmoothing: env.EMOTION_SMOOTHING,
    },
    confidence: {
      person: env.MIN_PERSON_CONFIDENCE,
      face: env.MIN_FACE_CONFIDENCE,
      emotion: env.MIN_EMOTION_CONFIDENCE,
      speech: env.MIN_SPEECH_CONFIDENCE,
    },
    dialogue: {
      provider: env.DIALOGUE_PROVIDER,
      rasaUrl: env.RASA_URL,
      anthropicApiKey: env.ANTHROPIC_API_KEY,
      model: env.DIALOGUE_MODEL,
      timeoutMs: env.DIALOGUE_TIMEOUT_MS,
      maxQueuedUtterances: env.MAX_QUEUED_UTTERANCES,
    },
    actuation: { timeoutMs: env.ACTUATION_TIMEOUT_MS },
    farewellText: env.FAREWELL_TEXT === undefined ? undefined : env.FAREWELL_TEXT.trim() || null,
    tickIntervalMs: env.TICK_INTERVAL_MS,
    channelCapacity: env.CHANNEL_CAPACITY,
    server: { port: env.PORT },
  }
}

function readConfigFile(filePath: string): Record<string, unknown> {
  let raw: string
  try {
    raw = fs.readFileSync(filePath, 'utf-8')
  } catch (error) {
    throw new ConfigError(`Cannot read config file ${filePath}`, [error instanceof Error ? error.message : String(error)])
  }

  let json: unknown
  try {
    json = JSON.parse(raw)
  } catch (error) {
    throw new ConfigError(`Config file ${filePath} is not valid JSON`, [error instanceof Error ? error.message : String(error)])
  }

  const parsed = fileSchema.safeParse(json)
  if (!parsed.success) {
    throw new ConfigError(`Invalid config file ${filePath}`, formatIssues(parsed.error))
  }
  return parsed.data
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): OrchestratorConfig {
  // Empty variables count as unset
  const defined = Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined && value !== ''))

  const parsedEnv = envSchema.safeParse(defined)
  if (!parsedEnv.success) {
    throw new ConfigError('Invalid environment', formatIssues(parsedEnv.error))
  }

  let merged = mergeDeep(DEFAULT_ORCHESTRATOR_CONFIG, {})
  if (parsedEnv.data.ORCHESTRATOR_CONFIG) {
    merged = mergeDeep(merged, readConfigFile(parsedEnv.data.ORCHESTRATOR_CONFIG))
  }
  merged = mergeDeep(merged, overridesFromEnv(parsedEnv.data))
  if (typeof merged.microphone === 'string') {
    merged.microphone = microphoneSetting(merged.microphone) ?? null
  }

  const result = orchestratorConfigSchema.safeParse(merged)
  if (!result.success) {
    throw new ConfigError('Invalid configuration', formatIssues(result.error))
  }
  return result.data
}
