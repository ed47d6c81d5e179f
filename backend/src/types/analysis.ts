export const DOCUMENT_TYPES = ['Invoice', 'Information'] as const
export const SENTIMENTS = ['Positive', 'Negative', 'Neutral'] as const

export type DocumentType = (typeof DOCUMENT_TYPES)[number]
export type Sentiment = (typeof SENTIMENTS)[number]

/** 小数部2桁以上の10進文字列。丸めない (例: "1500.00", "1.005") */
export type Money = string

export interface InvoiceLineItem {
  readonly name: string
  readonly quantity: number
  readonly unitPrice: Money
  readonly total: Money
}

export interface InvoiceData {
  readonly clientName: string
  readonly clientAddress: string
  readonly providerName: string
  readonly providerAddress: string
  readonly invoiceNumber: string
  /** YYYY-MM-DD */
  readonly date: string | null
  readonly total: Money
  readonly products: readonly InvoiceLineItem[]
}

export interface InformationData {
  readonly description: string
  readonly summary: string
  readonly sentiment: Sentiment
}

export type AnalysisResult =
  | {
      readonly documentType: 'Invoice'
      readonly invoiceData: InvoiceData
      readonly informationData: null
    }
  | {
      readonly documentType: 'Information'
      readonly invoiceData: null
      readonly informationData: InformationData
    }

export type ImageMediaType = 'image/png' | 'image/jpeg'

export type AnalysisPart =
  | { readonly type: 'text'; readonly text: string }
  | { readonly type: 'image'; readonly mediaType: ImageMediaType; readonly data: string }

export interface AnalysisRequest {
  readonly instruction: string
  readonly parts: readonly AnalysisPart[]
}
