import { describe, it, expect, beforeEach, vi } from 'vitest'
import { ConcreteHttpRequestBuilder } from './builder.js'
import { RequestDirector } from './director.js'
import { HttpRequest } from './httpRequest.js'
import { runBuilderDemo } from './demo.js'

describe('ConcreteHttpRequestBuilder', () => {
  let builder: ConcreteHttpRequestBuilder

  beforeEach(() => {
    builder = new ConcreteHttpRequestBuilder()
  })

  it('should start from an empty request', () => {
    const request = builder.getRequest()
    expect(request).toBeInstanceOf(HttpRequest)
    expect(request.url).toBeUndefined()
    expect(request.headers).toEqual({})
    expect(request.body).toEqual({})
  })

  it('should accumulate headers', () => {
    builder.addHeader('Accept', 'application/json').addHeader('X-Trace', 'abc')

    expect(builder.getRequest().headers).toEqual({
      Accept: 'application/json',
      'X-Trace': 'abc',
    })
  })

  it('should start a new request on reset', () => {
    builder.setUrl('https://one.example').addHeader('A', '1')
    const first = builder.getRequest()

    builder.reset().setUrl('https://two.example')
    const second = builder.getRequest()

    expect(second).not.toBe(first)
    expect(second.headers).toEqual({})
    expect(first.url).toBe('https://one.example')
    expect(first.headers).toEqual({ A: '1' })
  })

  it('should not share header or body storage between requests', () => {
    builder.addHeader('A', '1')
    const first = builder.getRequest()
    builder.reset()
    const second = builder.getRequest()

    expect(first.headers).not.toBe(second.headers)
    expect(first.body).not.toBe(second.body)
  })

  it('should copy the body it is given', () => {
    const body = { id: 7 }
    builder.setBody(body)
    body.id = 8

    expect(builder.getRequest().body).toEqual({ id: 7 })
  })
})

describe('request body ownership', () => {
  it('should deep-copy nested body values', () => {
    const body = { user: { name: 'ada', roles: ['admin'] } }
    const builder = new ConcreteHttpRequestBuilder().setBody(body)

    body.user.name = 'grace'
    body.user.roles.push('owner')

    expect(builder.getRequest().body).toEqual({ user: { name: 'ada', roles: ['admin'] } })
  })

  it('should not share nested director body values between requests', () => {
    const builder = new ConcreteHttpRequestBuilder()
    const director = new RequestDirector(builder, { body: { payload: { count: 1 } } })

    director.buildPostRequest()
    const first = builder.getRequest()
    director.buildPutRequest()
    const second = builder.getRequest()

    const payload = first.body['payload']
    if (payload && typeof payload === 'object' && !Array.isArray(payload)) {
      payload['count'] = 99
    }

    expect(second.body).toEqual({ payload: { count: 1 } })
    expect(second.body['payload']).not.toBe(first.body['payload'])
  })
})

describe('HttpRequest.toString', () => {
  it('should render every field', () => {
    const request = new ConcreteHttpRequestBuilder()
      .setUrl('https://example.com')
      .setMethod('POST')
      .setBody({ key: 'value' })
      .setTimeout(10)
      .addHeader('Authorization', 'Bearer 1234567890')
      .getRequest()

    expect(request.toString()).toBe(
      'HttpRequest(url=https://example.com, method=POST, ' +
        'headers={"Authorization":"Bearer 1234567890"}, body={"key":"value"}, timeout=10)'
    )
  })

  it('should mark unset fields', () => {
    expect(new HttpRequest().toString()).toBe(
      'HttpRequest(url=undefined, method=undefined, headers={}, body={}, timeout=undefined)'
    )
  })
})

describe('RequestDirector', () => {
  let builder: ConcreteHttpRequestBuilder
  let director: RequestDirector

  beforeEach(() => {
    builder = new ConcreteHttpRequestBuilder()
    director = new RequestDirector(builder)
  })

  it('should build a GET request without body or headers', () => {
    director.buildGetRequest()
    const request = builder.getRequest()

    expect(request.url).toBe('https://example.com')
    expect(request.method).toBe('GET')
    expect(request.timeout).toBe(10)
    expect(request.headers).toEqual({})
    expect(request.body).toEqual({})
  })

  it('should build a POST request with body and authorization', () => {
    director.buildPostRequest()
    const request = builder.getRequest()

    expect(request.method).toBe('POST')
    expect(request.body).toEqual({ key: 'value' })
    expect(request.headers).toEqual({ Authorization: 'Bearer 1234567890' })
  })

  it('should build a PUT request with body and authorization', () => {
    director.buildPutRequest()
    const request = builder.getRequest()

    expect(request.method).toBe('PUT')
    expect(request.body).toEqual({ key: 'value' })
    expect(request.headers).toEqual({ Authorization: 'Bearer 1234567890' })
  })

  it('should not carry headers from a previous recipe', () => {
    director.buildPostRequest()
    director.buildGetRequest()

    expect(builder.getRequest().headers).toEqual({})
  })

  it('should apply custom options', () => {
    const custom = new RequestDirector(builder, {
      baseUrl: 'https://api.test',
      timeout: 3,
      authorization: 'Bearer test-token',
      body: { name: 'widget' },
    })

    custom.buildPutRequest()
    const request = builder.getRequest()

    expect(request.url).toBe('https://api.test')
    expect(request.timeout).toBe(3)
    expect(request.body).toEqual({ name: 'widget' })
    expect(request.headers).toEqual({ Authorization: 'Bearer test-token' })
  })

  it('should drive the new builder after changeBuilder', () => {
    const other = new ConcreteHttpRequestBuilder()
    director.changeBuilder(other)

    director.buildGetRequest()

    expect(other.getRequest().method).toBe('GET')
    expect(builder.getRequest().method).toBeUndefined()
  })
})

describe('runBuilderDemo', () => {
  it('should produce four independent requests', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {})

    const requests = runBuilderDemo()

    expect(requests.map((r) => r.method)).toEqual(['GET', 'POST', 'PUT', 'GET'])
    expect(requests[0]?.headers).toEqual({})
    expect(requests[3]?.headers).toEqual({ Authorization: 'Bearer 1234567890' })
    expect(logSpy).toHaveBeenCalledTimes(4)
    logSpy.mockRestore()
  })
})
