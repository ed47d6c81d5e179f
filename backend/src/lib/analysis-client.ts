import { createGoogleGenerativeAI } from '@ai-sdk/google'
import { generateText, type ImagePart, type LanguageModel, type TextPart } from 'ai'
import type { AnalysisPart, AnalysisRequest } from '../types/analysis.js'
import { ExternalServiceError, errorMessage } from './errors.js'

/** 外部の解析サービス。応答は解析スキーマに沿ったJSONを含む生テキスト */
export interface AnalysisClient {
  analyze(request: AnalysisRequest, signal: AbortSignal): Promise<string>
}

export interface GeminiClientOptions {
  readonly apiKey: string
  readonly model: string
}

function toContentPart(part: AnalysisPart): TextPart | ImagePart {
  return part.type === 'image'
    ? { type: 'image', image: part.data, mediaType: part.mediaType }
    : { type: 'text', text: part.text }
}

export class GeminiAnalysisClient implements AnalysisClient {
  private readonly model: LanguageModel

  constructor(options: GeminiClientOptions) {
    const google = createGoogleGenerativeAI({ apiKey: options.apiKey })
    this.model = google(options.model)
  }

  async analyze(request: AnalysisRequest, signal: AbortSignal): Promise<string> {
    try {
      const result = await generateText({
        model: this.model,
        system: request.instruction,
        messages: [{ role: 'user', content: request.parts.map(toContentPart) }],
        abortSignal: signal,
        // タイムアウトは呼び出し側で一括管理する
        maxRetries: 0,
      })
      return result.text
    } catch (error) {
      throw new ExternalServiceError(`Analysis service request failed: ${errorMessage(error)}`, { cause: error })
    }
  }
}
