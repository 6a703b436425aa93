import { describe, expect, it } from 'vitest'
import { CookieJar } from './cookies.js'

function setCookies(...lines: string[]): Headers {
  const h = new Headers()
  for (const line of lines) h.append('set-cookie', line)
  return h
}

describe('CookieJar', () => {
  it('按 host/domain/path 选择 cookie', () => {
    const jar = new CookieJar()
    jar.store('https://svc.test/login', setCookies('a=1; Path=/; HttpOnly', 'b=2; Domain=.svc.test; Path=/api'))

    expect(jar.header('https://svc.test/x')).toBe('a=1')
    expect(jar.header('https://svc.test/api/list')).toBe('a=1; b=2')
    expect(jar.header('https://api.svc.test/api/v1')).toBe('b=2')
    expect(jar.header('https://other.test/')).toBeNull()
  })

  it('Path 按段边界匹配', () => {
    const jar = new CookieJar()
    jar.store('https://svc.test/api/login', setCookies('tok=1; Path=/api'))

    expect(jar.header('https://svc.test/api')).toBe('tok=1')
    expect(jar.header('https://svc.test/api/v1')).toBe('tok=1')
    expect(jar.header('https://svc.test/apiary')).toBeNull()
  })

  it('Max-Age=0 删除已有 cookie', () => {
    const jar = new CookieJar()
    jar.store('https://svc.test/login', setCookies('sid=abc123; Path=/', 'lang=en'))
    jar.store('https://svc.test/signout', setCookies('sid=; Path=/; Max-Age=0'))
    expect(jar.size).toBe(1)
    expect(jar.header('https://svc.test/')).toBe('lang=en')
  })

  it('过期的 Expires 同样删除', () => {
    const jar = new CookieJar()
    jar.store('https://svc.test/', setCookies('sid=abc123'))
    jar.store('https://svc.test/', setCookies('sid=gone; Expires=Thu, 01 Jan 1970 00:00:00 GMT'))
    expect(jar.header('https://svc.test/')).toBeNull()
  })

  it('clear 清空全部', () => {
    const jar = new CookieJar()
    jar.store('https://svc.test/', setCookies('sid=abc123'))
    jar.clear()
    expect(jar.size).toBe(0)
  })
})
