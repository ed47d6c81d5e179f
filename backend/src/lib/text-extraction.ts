import { extname } from 'node:path'
import pdfParse from 'pdf-parse'
import type { AnalysisPart, ImageMediaType } from '../types/analysis.js'
import type { ContentBuffer } from './content-buffer.js'
import { ExternalServiceError } from './errors.js'

export const MAX_TEXT_LENGTH = 30_000
export const PDF_EXTRACTION_FAILED = 'PDF content could not be extracted.'

const IMAGE_TYPES: Record<string, ImageMediaType> = {
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.png': 'image/png',
}
const TEXT_EXTENSIONS = new Set(['.pdf', '.txt', '.csv', '.json', '.md'])

export type FileKind = 'image' | 'text' | 'unknown'

export type PdfTextExtractor = (bytes: Buffer) => Promise<string>

/** pdf-parse は全ページのテキストを連結して返す */
export const extractPdfText: PdfTextExtractor = async (bytes) => {
  const result = await pdfParse(bytes)
  return result.text
}

export function classifyFile(fileName: string): FileKind {
  const extension = extname(fileName).toLowerCase()
  if (extension in IMAGE_TYPES) return 'image'
  if (TEXT_EXTENSIONS.has(extension)) return 'text'
  return 'unknown'
}

async function extractText(content: ContentBuffer, fileName: string, extractPdf: PdfTextExtractor): Promise<string> {
  const extension = extname(fileName).toLowerCase()
  if (extension === '.pdf') {
    try {
      return await extractPdf(content.toBuffer())
    } catch {
      return PDF_EXTRACTION_FAILED
    }
  }
  if (TEXT_EXTENSIONS.has(extension)) {
    return content.text()
  }
  // 未対応の形式もファイル名だけ渡して解析を続ける
  return `[File: ${fileName}]`
}

/**
 * 解析リクエストに載せる内容を組み立てる。
 * 画像はbase64、それ以外は抽出したテキストを上限文字数で切り詰める。
 */
export async function buildAnalysisParts(
  content: ContentBuffer,
  fileName: string,
  extractPdf: PdfTextExtractor = extractPdfText,
): Promise<AnalysisPart[]> {
  const imageType = IMAGE_TYPES[extname(fileName).toLowerCase()]
  if (imageType) {
    return [
      { type: 'image', mediaType: imageType, data: content.base64() },
      { type: 'text', text: 'Analyze this image document.' },
    ]
  }

  const text = await extractText(content, fileName, extractPdf)
  if (text.trim() === '') {
    throw new ExternalServiceError('Could not extract text.')
  }
  return [{ type: 'text', text: `Analyze this document content:\n\n${text.slice(0, MAX_TEXT_LENGTH)}` }]
}
