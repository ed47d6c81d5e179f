import { z } from 'zod'
import { DOCUMENT_TYPES, SENTIMENTS, type AnalysisResult } from '../types/analysis.js'
import { ExternalServiceError } from './errors.js'

/** 解析クライアントに渡す固定の指示文 */
export const ANALYSIS_INSTRUCTION = `
You are an expert document analyzer. Analyze the provided document (text or image) and determine if it is an 'Invoice' or 'Information'.
Return ONLY a valid JSON object matching this structure:
{
    "documentType": "Invoice" | "Information",
    "invoiceData": {
        "clientName": "string",
        "clientAddress": "string",
        "providerName": "string",
        "providerAddress": "string",
        "invoiceNumber": "string",
        "date": "YYYY-MM-DD",
        "total": "0.00",
        "products": [
            { "name": "string", "quantity": 0, "unitPrice": "0.00", "total": "0.00" }
        ]
    },
    "informationData": {
        "description": "string",
        "summary": "string",
        "sentiment": "Positive" | "Negative" | "Neutral"
    }
}
If it is an Invoice, populate 'invoiceData' and leave 'informationData' null.
If it is Information, populate 'informationData' and leave 'invoiceData' null.
Dates must be ISO 8601 dates. Money values must be plain decimal numbers without currency symbols.
Do not use markdown code blocks in response, just raw JSON.
`.trim()

// 小文字化したキー → 正規のキー名
const CANONICAL_KEYS = new Map(
  [
    'documentType',
    'invoiceData',
    'informationData',
    'clientName',
    'clientAddress',
    'providerName',
    'providerAddress',
    'invoiceNumber',
    'date',
    'total',
    'products',
    'name',
    'quantity',
    'unitPrice',
    'description',
    'summary',
    'sentiment',
  ].map((key) => [key.toLowerCase(), key]),
)

function normalizeKeys(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(normalizeKeys)
  if (typeof value !== 'object' || value === null) return value
  return Object.fromEntries(
    Object.entries(value).map(([key, inner]) => [CANONICAL_KEYS.get(key.toLowerCase()) ?? key, normalizeKeys(inner)]),
  )
}

function caseInsensitiveEnum<const T extends readonly [string, ...string[]]>(values: T) {
  return z.preprocess(
    (input) => (typeof input === 'string' ? (values.find((v) => v.toLowerCase() === input.trim().toLowerCase()) ?? input) : input),
    z.enum(values),
  )
}

const DECIMAL = /^-?\d+(\.\d+)?$/

/** 指数表記を含む数値の文字列表現を桁をずらした10進表記に展開する */
function expandExponent(repr: string): string {
  const [mantissa, exponent = '0'] = repr.split('e')
  const negative = mantissa.startsWith('-')
  const unsigned = negative ? mantissa.slice(1) : mantissa
  const [whole, fraction = ''] = unsigned.split('.')
  const digits = whole + fraction
  const point = whole.length + Number(exponent)
  let expanded: string
  if (point <= 0) expanded = `0.${'0'.repeat(-point)}${digits}`
  else if (point >= digits.length) expanded = digits + '0'.repeat(point - digits.length)
  else expanded = `${digits.slice(0, point)}.${digits.slice(point)}`
  return negative ? `-${expanded}` : expanded
}

// 2進浮動小数点を経由せず、桁を落とさずに小数部を2桁以上へ揃える
function normalizeDecimal(value: string): string {
  const negative = value.startsWith('-')
  const [whole, fraction = ''] = (negative ? value.slice(1) : value).split('.')
  const integer = whole.replace(/^0+(?=\d)/, '')
  const normalized = `${integer}.${fraction.padEnd(2, '0')}`
  return negative && /[1-9]/.test(normalized) ? `-${normalized}` : normalized
}

const money = z
  .union([z.number().finite().transform((value) => expandExponent(String(value))), z.string().trim()])
  .refine((value) => DECIMAL.test(value), 'Invalid decimal value')
  .transform(normalizeDecimal)

const text = z
  .string()
  .nullish()
  .transform((value) => value ?? '')

const isoDate = z
  .string()
  .nullish()
  .transform((value, ctx) => {
    if (!value) return null
    const parsed = new Date(value)
    if (Number.isNaN(parsed.getTime())) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid date: ${value}` })
      return z.NEVER
    }
    const date = parsed.toISOString().slice(0, 10)
    // 日付のみの値はタイムゾーン変換せずそのまま使う。存在しない日付は繰り上げずに拒否する
    if (/^\d{4}-\d{2}-\d{2}$/.test(value)) {
      if (date !== value) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid date: ${value}` })
        return z.NEVER
      }
      return value
    }
    return date
  })

const lineItemSchema = z.object({
  name: text,
  quantity: z.coerce.number().int().nonnegative(),
  unitPrice: money,
  total: money,
})

const invoiceSchema = z.object({
  clientName: text,
  clientAddress: text,
  providerName: text,
  providerAddress: text,
  invoiceNumber: text,
  date: isoDate,
  total: money,
  products: z.array(lineItemSchema).nullish().transform((items) => items ?? []),
})

const informationSchema = z.object({
  description: text,
  summary: text,
  sentiment: caseInsensitiveEnum(SENTIMENTS),
})

const documentTypeSchema = caseInsensitiveEnum(DOCUMENT_TYPES)

// 選ばれなかった側は null か未指定でなければならない
const analysisResultSchema = z.discriminatedUnion('documentType', [
  z.object({
    documentType: z.literal('Invoice'),
    invoiceData: invoiceSchema,
    informationData: z.null().optional(),
  }),
  z.object({
    documentType: z.literal('Information'),
    invoiceData: z.null().optional(),
    informationData: informationSchema,
  }),
])

/** コードフェンスを取り除く */
export function stripCodeFences(raw: string): string {
  return raw
    .replace(/```json/gi, '')
    .replace(/```/g, '')
    .trim()
}

/**
 * 解析クライアントの応答テキストを AnalysisResult に変換する。
 * キーは大文字小文字を区別しない。形が合わなければ ExternalServiceError。
 */
export function parseAnalysisResult(raw: string): AnalysisResult {
  const cleaned = stripCodeFences(raw)
  if (!cleaned) {
    throw new ExternalServiceError('Empty response from analysis service.')
  }

  let json: unknown
  try {
    json = JSON.parse(cleaned)
  } catch (error) {
    throw new ExternalServiceError('Analysis response is not valid JSON.', { cause: error })
  }

  const normalized = normalizeKeys(json)
  if (typeof normalized === 'object' && normalized !== null && 'documentType' in normalized) {
    const documentType = documentTypeSchema.safeParse(normalized.documentType)
    if (documentType.success) normalized.documentType = documentType.data
  }

  const parsed = analysisResultSchema.safeParse(normalized)
  if (!parsed.success) {
    const detail = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ')
    throw new ExternalServiceError(`Analysis response does not match the schema: ${detail}`, { cause: parsed.error })
  }

  const result = parsed.data
  return result.documentType === 'Invoice'
    ? { documentType: 'Invoice', invoiceData: result.invoiceData, informationData: null }
    : { documentType: 'Information', invoiceData: null, informationData: result.informationData }
}

