/**
 * Builder — public API
 */
export type { DirectorOptions, HttpMethod, HttpRequestBuilder, RequestBody } from './types.js'

export { HttpRequest } from './httpRequest.js'
export { ConcreteHttpRequestBuilder } from './builder.js'
export { RequestDirector } from './director.js'
export { runBuilderDemo } from './demo.js'
