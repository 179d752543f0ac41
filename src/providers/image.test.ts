import { beforeEach, describe, expect, it, vi } from 'vitest'
import { createImageGenerator } from './image'

const mockFetch = vi.hoisted(() => vi.fn())

vi.mock('../http', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../http')>()),
  httpFetch: mockFetch
}))

function jsonResponse(body: unknown, status = 200) {
  return {
    ok: status >= 200 && status < 300,
    status,
    headers: { get: () => null },
    text: async () => JSON.stringify(body),
    json: async () => body,
    arrayBuffer: async () => new ArrayBuffer(0)
  }
}

describe('createImageGenerator', () => {
  beforeEach(() => {
    mockFetch.mockReset()
  })

  it('decodes the returned image', async () => {
    const png = Buffer.from('fake-png-bytes')
    mockFetch.mockResolvedValueOnce(jsonResponse({ data: [{ b64_json: png.toString('base64') }] }))
    const generate = createImageGenerator({ apiKey: 'test-secret' })

    const result = await generate({ prompt: 'A lighthouse', size: '1024x1792' })

    expect(result.ok && result.value.toString()).toBe('fake-png-bytes')
    const [url, options] = mockFetch.mock.calls[0] ?? []
    expect(url).toBe('https://api.openai.com/v1/images/generations')
    expect(JSON.parse(options.body)).toEqual({
      model: 'dall-e-3',
      prompt: 'A lighthouse',
      size: '1024x1792',
      n: 1,
      response_format: 'b64_json'
    })
  })

  it('uses the configured model', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ data: [{ b64_json: 'AA==' }] }))
    const generate = createImageGenerator({ apiKey: 'test-secret', model: 'gpt-image-1' })

    await generate({ prompt: 'p', size: '1024x1024' })

    const [, options] = mockFetch.mock.calls[0] ?? []
    expect(JSON.parse(options.body).model).toBe('gpt-image-1')
  })

  it('reports a response without image data', async () => {
    mockFetch.mockResolvedValueOnce(jsonResponse({ data: [] }))
    const generate = createImageGenerator({ apiKey: 'test-secret' })

    const result = await generate({ prompt: 'p', size: '1024x1024' })

    expect(result).toEqual({
      ok: false,
      error: { type: 'invalid_response', message: 'Empty response from API' }
    })
  })

  it('classifies a 402 as quota', async () => {
    mockFetch.mockResolvedValueOnce({
      ok: false,
      status: 402,
      headers: { get: () => null },
      text: async () => 'billing limit',
      json: async () => ({}),
      arrayBuffer: async () => new ArrayBuffer(0)
    })
    const generate = createImageGenerator({ apiKey: 'test-secret' })

    const result = await generate({ prompt: 'p', size: '1024x1024' })

    expect(result).toEqual({
      ok: false,
      error: { type: 'quota', message: 'Quota exceeded: billing limit' }
    })
  })
})
