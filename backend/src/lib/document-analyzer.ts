import { setTimeout as sleep } from 'node:timers/promises'
import type { AnalysisRequest, AnalysisResult } from '../types/analysis.js'
import type { AnalysisClient } from './analysis-client.js'
import { ANALYSIS_INSTRUCTION, parseAnalysisResult } from './analysis-schema.js'
import { EVENT_TYPES, type AuditRecorder } from './audit-log.js'
import type { ContentBuffer } from './content-buffer.js'
import { ExternalServiceError, errorMessage } from './errors.js'
import type { Logger } from './logger.js'
import { buildAnalysisParts, extractPdfText, type PdfTextExtractor } from './text-extraction.js'

export interface DocumentAnalyzerDeps {
  /** null の場合は外部サービスを呼ばずモック結果を返す */
  readonly client: AnalysisClient | null
  readonly audit: AuditRecorder
  readonly logger: Logger
  readonly timeoutMs: number
  readonly mockDelayMs: number
  readonly now?: () => Date
  readonly delay?: (ms: number) => Promise<unknown>
  readonly extractPdf?: PdfTextExtractor
}

export function fallbackResult(message: string): AnalysisResult {
  return {
    documentType: 'Information',
    invoiceData: null,
    informationData: { description: 'Analysis Failed', summary: `Error: ${message}`, sentiment: 'Neutral' },
  }
}

/** ファイル名に "invoice" を含めば請求書、それ以外は情報文書のモック */
export function mockResult(fileName: string, now: Date): AnalysisResult {
  if (fileName.toLowerCase().includes('invoice')) {
    return {
      documentType: 'Invoice',
      invoiceData: {
        clientName: 'Tech Solutions Inc.',
        clientAddress: '123 Innovation Dr',
        providerName: 'Cloud Services LLC',
        providerAddress: '456 Server Ave',
        invoiceNumber: 'INV-MOCK-001',
        date: now.toISOString().slice(0, 10),
        total: '1500.00',
        products: [{ name: 'Mock Service', quantity: 1, unitPrice: '1500.00', total: '1500.00' }],
      },
      informationData: null,
    }
  }
  return {
    documentType: 'Information',
    invoiceData: null,
    informationData: { description: 'Mock Info', summary: 'This is a mock response.', sentiment: 'Neutral' },
  }
}

export function summarize(result: AnalysisResult): string {
  if (result.documentType === 'Invoice') {
    return `Invoice ${result.invoiceData.invoiceNumber} for ${result.invoiceData.total}`
  }
  return `Info: ${result.informationData.summary.slice(0, 50)}...`
}

/**
 * アップロード内容を外部の解析サービスで分類・抽出する。
 * 失敗は例外にせずフォールバック結果を返し、1回の呼び出しにつき監査イベントを1件だけ記録する。
 */
export class DocumentAnalyzer {
  private readonly now: () => Date
  private readonly delay: (ms: number) => Promise<unknown>
  private readonly extractPdf: PdfTextExtractor

  constructor(private readonly deps: DocumentAnalyzerDeps) {
    this.now = deps.now ?? (() => new Date())
    this.delay = deps.delay ?? sleep
    this.extractPdf = deps.extractPdf ?? extractPdfText
  }

  get usesMock(): boolean {
    return this.deps.client === null
  }

  async analyze(content: ContentBuffer, fileName: string, ownerId: string | null): Promise<AnalysisResult> {
    const { client, audit, logger } = this.deps

    if (!client) {
      await audit.append(EVENT_TYPES.analysisWarning, 'Gemini API Key not found. Using mock.', ownerId)
      await this.delay(this.deps.mockDelayMs)
      return mockResult(fileName, this.now())
    }

    let result: AnalysisResult
    try {
      const parts = await buildAnalysisParts(content, fileName, this.extractPdf)
      const raw = await this.callWithTimeout(client, { instruction: ANALYSIS_INSTRUCTION, parts })
      result = parseAnalysisResult(raw)
    } catch (error) {
      const message = errorMessage(error)
      logger.warn({ err: error, fileName }, 'Document analysis failed, using fallback result')
      await audit.append(EVENT_TYPES.analysisError, `Failed to analyze ${fileName}: ${message}`, ownerId)
      return fallbackResult(message)
    }

    await audit.append(EVENT_TYPES.analysis, `Analyzed ${fileName}: ${summarize(result)}`, ownerId)
    return result
  }

  private async callWithTimeout(client: AnalysisClient, request: AnalysisRequest): Promise<string> {
    const { timeoutMs } = this.deps
    const controller = new AbortController()
    let timer: NodeJS.Timeout | undefined
    const timeout = new Promise<never>((_resolve, reject) => {
      timer = setTimeout(() => {
        controller.abort()
        reject(new ExternalServiceError(`Analysis timed out after ${timeoutMs} ms`))
      }, timeoutMs)
    })

    try {
      return await Promise.race([client.analyze(request, controller.signal), timeout])
    } finally {
      clearTimeout(timer)
    }
  }
}
