import { z } from 'zod'
import { ConfigurationError } from './errors.js'

const booleanFlag = z
  .enum(['true', 'false', '1', '0', ''])
  .optional()
  .transform((value) => value === 'true' || value === '1')

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined))

const positiveInt = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback)

const envSchema = z.object({
  PORT: positiveInt(3000),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  SERVICE_NAME: z.string().default('docpipe-backend'),
  NODE_ENV: z.string().default('development'),
  AUTH_SECRET: z.string().min(1).default('development-secret'),
  FRONTEND_URL: optionalString,
  USE_REMOTE_STORAGE: booleanFlag,
  STORAGE_ACCESS_KEY: optionalString,
  STORAGE_SECRET: optionalString,
  STORAGE_REGION: optionalString,
  STORAGE_BUCKET: optionalString,
  STORAGE_KMS_KEY_NAME: optionalString,
  LOCAL_UPLOAD_DIR: z.string().default('./uploads'),
  PERSISTENCE: z.enum(['memory', 'bigquery']).default('memory'),
  BIGQUERY_DATASET_ID: z.string().default('docpipe'),
  GCP_PROJECT_ID: optionalString,
  GEMINI_API_KEY: optionalString,
  ANALYSIS_MODEL: z.string().default('gemini-2.5-flash'),
  ANALYSIS_TIMEOUT_MS: positiveInt(30_000),
  MOCK_ANALYSIS_DELAY_MS: positiveInt(1_500),
  REALTIME_TRANSPORT: z.enum(['websocket', 'sse', 'both']).default('both'),
})

export interface RemoteStorageConfig {
  readonly accessKey?: string
  readonly secret?: string
  readonly region?: string
  readonly bucket?: string
  readonly kmsKeyName?: string
}

export interface AppConfig {
  readonly port: number
  readonly log: {
    readonly level: string
    readonly serviceName: string
    readonly environment: string
  }
  readonly auth: { readonly secret: string }
  readonly frontendUrl?: string
  readonly storage: {
    readonly useRemote: boolean
    readonly localDirectory: string
    readonly remote: RemoteStorageConfig
  }
  readonly persistence:
    | { readonly kind: 'memory' }
    | { readonly kind: 'bigquery'; readonly datasetId: string; readonly projectId?: string }
  readonly analysis: {
    readonly apiKey?: string
    readonly model: string
    readonly timeoutMs: number
    readonly mockDelayMs: number
  }
  readonly realtime: { readonly transport: 'websocket' | 'sse' | 'both' }
}

/** 環境変数を検証し、アプリケーション設定へ変換する */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env)
  if (!parsed.success) {
    const keys = parsed.error.issues.map((issue) => issue.path.join('.')).join(', ')
    throw new ConfigurationError(`Invalid configuration: ${keys}`, { cause: parsed.error })
  }

  const e = parsed.data
  return {
    port: e.PORT,
    log: { level: e.LOG_LEVEL, serviceName: e.SERVICE_NAME, environment: e.NODE_ENV },
    auth: { secret: e.AUTH_SECRET },
    frontendUrl: e.FRONTEND_URL,
    storage: {
      useRemote: e.USE_REMOTE_STORAGE,
      localDirectory: e.LOCAL_UPLOAD_DIR,
      remote: {
        accessKey: e.STORAGE_ACCESS_KEY,
        secret: e.STORAGE_SECRET,
        region: e.STORAGE_REGION,
        bucket: e.STORAGE_BUCKET,
        kmsKeyName: e.STORAGE_KMS_KEY_NAME,
      },
    },
    persistence:
      e.PERSISTENCE === 'bigquery'
        ? { kind: 'bigquery', datasetId: e.BIGQUERY_DATASET_ID, projectId: e.GCP_PROJECT_ID }
        : { kind: 'memory' },
    analysis: {
      apiKey: e.GEMINI_API_KEY,
      model: e.ANALYSIS_MODEL,
      timeoutMs: e.ANALYSIS_TIMEOUT_MS,
      mockDelayMs: e.MOCK_ANALYSIS_DELAY_MS,
    },
    realtime: { transport: e.REALTIME_TRANSPORT },
  }
}
