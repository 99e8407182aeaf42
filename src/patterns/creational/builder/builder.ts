import { cloneJsonMap } from '../../../utils/jsonValue.js'
import { HttpRequest } from './httpRequest.js'
import type { HttpMethod, HttpRequestBuilder, RequestBody } from './types.js'

export class ConcreteHttpRequestBuilder implements HttpRequestBuilder {
  private request = new HttpRequest()

  reset(): this {
    this.request = new HttpRequest()
    return this
  }

  setUrl(url: string): this {
    this.request.url = url
    return this
  }

  setMethod(method: HttpMethod): this {
    this.request.method = method
    return this
  }

  setBody(body: RequestBody): this {
    this.request.body = cloneJsonMap(body)
    return this
  }

  setTimeout(timeout: number): this {
    this.request.timeout = timeout
    return this
  }

  addHeader(key: string, value: string): this {
    this.request.headers[key] = value
    return this
  }

  /**
   * Returns the request built so far. Does not reset; call reset() before
   * starting the next one.
   */
  getRequest(): HttpRequest {
    return this.request
  }
}
