import type { HttpMethod, RequestBody } from './types.js'

/**
 * The product assembled by a builder. Unset fields stay undefined.
 */
export class HttpRequest {
  url?: string
  method?: HttpMethod
  headers: Record<string, string> = {}
  body: RequestBody = {}
  timeout?: number

  toString(): string {
    return (
      `HttpRequest(url=${this.url ?? 'undefined'}, method=${this.method ?? 'undefined'}, ` +
      `headers=${JSON.stringify(this.headers)}, body=${JSON.stringify(this.body)}, ` +
      `timeout=${this.timeout ?? 'undefined'})`
    )
  }
}
