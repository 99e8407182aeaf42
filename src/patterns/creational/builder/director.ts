import type { DirectorOptions, HttpRequestBuilder, RequestBody } from './types.js'

const DEFAULTS = {
  baseUrl: 'https://example.com',
  timeout: 10,
  authorization: 'Bearer 1234567890',
  body: { key: 'value' },
} satisfies Required<DirectorOptions>

/**
 * Drives a builder through fixed recipes. The director never returns the
 * product; callers read it from their builder.
 */
export class RequestDirector {
  private readonly baseUrl: string
  private readonly timeout: number
  private readonly authorization: string
  private readonly body: RequestBody

  constructor(
    private builder: HttpRequestBuilder,
    options: DirectorOptions = {}
  ) {
    this.baseUrl = options.baseUrl ?? DEFAULTS.baseUrl
    this.timeout = options.timeout ?? DEFAULTS.timeout
    this.authorization = options.authorization ?? DEFAULTS.authorization
    this.body = options.body ?? DEFAULTS.body
  }

  changeBuilder(builder: HttpRequestBuilder): void {
    this.builder = builder
  }

  buildGetRequest(): void {
    this.builder.reset().setUrl(this.baseUrl).setMethod('GET').setTimeout(this.timeout)
  }

  buildPostRequest(): void {
    this.builder
      .reset()
      .setUrl(this.baseUrl)
      .setMethod('POST')
      .setBody(this.body)
      .setTimeout(this.timeout)
      .addHeader('Authorization', this.authorization)
  }

  buildPutRequest(): void {
    this.builder
      .reset()
      .setUrl(this.baseUrl)
      .setMethod('PUT')
      .setBody(this.body)
      .setTimeout(this.timeout)
      .addHeader('Authorization', this.authorization)
  }
}
