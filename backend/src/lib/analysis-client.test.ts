import { describe, it, expect, jest, beforeEach } from '@jest/globals'

const mockGenerateText = jest.fn<(options: Record<string, unknown>) => Promise<{ text: string }>>()
jest.mock('ai', () => ({ generateText: mockGenerateText }))
jest.mock('@ai-sdk/google', () => ({
  createGoogleGenerativeAI: () => (modelId: string) => ({ modelId }),
}))

import { GeminiAnalysisClient } from './analysis-client.js'
import { ExternalServiceError } from './errors.js'

describe('GeminiAnalysisClient', () => {
  beforeEach(() => {
    mockGenerateText.mockReset()
  })

  it('should send the instruction and parts as one user message', async () => {
    mockGenerateText.mockResolvedValue({ text: '{"documentType":"Information"}' })
    const client = new GeminiAnalysisClient({ apiKey: 'test-key', model: 'gemini-2.5-flash' })
    const signal = new AbortController().signal

    const text = await client.analyze(
      {
        instruction: 'classify',
        parts: [
          { type: 'image', mediaType: 'image/png', data: 'aGVsbG8=' },
          { type: 'text', text: 'Analyze this image document.' },
        ],
      },
      signal,
    )

    expect(text).toBe('{"documentType":"Information"}')
    expect(mockGenerateText).toHaveBeenCalledWith({
      model: { modelId: 'gemini-2.5-flash' },
      system: 'classify',
      messages: [
        {
          role: 'user',
          content: [
            { type: 'image', image: 'aGVsbG8=', mediaType: 'image/png' },
            { type: 'text', text: 'Analyze this image document.' },
          ],
        },
      ],
      abortSignal: signal,
      maxRetries: 0,
    })
  })

  it('should wrap provider failures as ExternalServiceError', async () => {
    mockGenerateText.mockRejectedValue(new Error('quota exceeded'))
    const client = new GeminiAnalysisClient({ apiKey: 'test-key', model: 'gemini-2.5-flash' })

    const call = client.analyze({ instruction: 'classify', parts: [] }, new AbortController().signal)

    await expect(call).rejects.toThrow(ExternalServiceError)
    await expect(call).rejects.toThrow('Analysis service request failed: quota exceeded')
  })
})
