/**
 * In-process stand-in for the scanner HTTP API
 * @module
 */

import type { FetchLike } from '../../src/collector/client.ts'
import { Logger, type LogLevel } from '../../src/utils/logger.ts'

export type RecordedRequest = {
  url: string
  method: string
  headers: Record<string, string>
  body: unknown
}

export type FakeReply = {
  status?: number
  body: unknown
  headers?: Record<string, string>
}

/**
 * Fake `fetch` answering from a queue of replies per URL
 *
 * A reply given as a function is computed from the request body. The last
 * reply of a queue is repeated once the queue is drained.
 */
export function createFakeFetch(
  routes: Record<string, Array<FakeReply | ((body: unknown) => FakeReply)>>,
): { fetch: FetchLike; requests: RecordedRequest[] } {
  const requests: RecordedRequest[] = []
  const cursors = new Map<string, number>()

  const fetch: FetchLike = (url, init) => {
    const bodyText = typeof init.body === 'string' ? init.body : ''
    const body: unknown = bodyText === '' ? undefined : JSON.parse(bodyText)
    const headers = new Headers(init.headers)
    requests.push({
      url,
      method: init.method ?? 'GET',
      headers: Object.fromEntries(headers.entries()),
      body,
    })

    const queue = routes[url]
    if (queue === undefined || queue.length === 0) {
      return Promise.resolve(new Response('not found', { status: 404 }))
    }
    const index = cursors.get(url) ?? 0
    cursors.set(url, index + 1)
    const entry = queue[Math.min(index, queue.length - 1)]
    const reply = typeof entry === 'function' ? entry(body) : entry
    const text = typeof reply.body === 'string' ? reply.body : JSON.stringify(reply.body)
    return Promise.resolve(new Response(text, { status: reply.status ?? 200, headers: reply.headers }))
  }

  return { fetch, requests }
}

/**
 * Logger that records `level: message` lines
 */
export function createRecordingLogger(): { logger: Logger; lines: string[] } {
  const lines: string[] = []
  const logger = new Logger({
    enabled: true,
    minLevel: 'debug',
    output: (level: LogLevel, message: string) => {
      lines.push(`${level}: ${message}`)
    },
  })
  return { logger, lines }
}
