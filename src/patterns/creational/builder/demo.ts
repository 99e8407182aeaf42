import { createLogger } from '../../../utils/logger.js'
import { ConcreteHttpRequestBuilder } from './builder.js'
import { RequestDirector } from './director.js'
import type { HttpRequest } from './httpRequest.js'

const logger = createLogger('builder')

export function runBuilderDemo(): HttpRequest[] {
  const builder = new ConcreteHttpRequestBuilder()
  const director = new RequestDirector(builder)
  const requests: HttpRequest[] = []

  director.buildGetRequest()
  requests.push(builder.getRequest())

  director.buildPostRequest()
  requests.push(builder.getRequest())

  director.buildPutRequest()
  requests.push(builder.getRequest())

  // without a director
  builder
    .reset()
    .setUrl('https://example.com')
    .setMethod('GET')
    .setTimeout(10)
    .addHeader('Authorization', 'Bearer 1234567890')
  requests.push(builder.getRequest())

  for (const request of requests) {
    logger.info(request.toString())
  }
  return requests
}
