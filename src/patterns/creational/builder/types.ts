import type { JsonMap } from '../../../utils/jsonValue.js'

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE' | 'HEAD' | 'OPTIONS'

export type RequestBody = JsonMap

export interface HttpRequestBuilder {
  reset(): this
  setUrl(url: string): this
  setMethod(method: HttpMethod): this
  setBody(body: RequestBody): this
  /** Timeout in seconds */
  setTimeout(timeout: number): this
  /** Adds to the headers collected since the last reset. */
  addHeader(key: string, value: string): this
}

export interface DirectorOptions {
  baseUrl?: string
  timeout?: number
  authorization?: string
  body?: RequestBody
}
