import { describe, expect, it } from 'vitest'
import { MissingParameterError, TooManyArgumentsError } from './errors.js'
import { placeholdersOf, resolveUrl, splitArgs, unrecognizedPlaceholders } from './resolver.js'
import type { EndpointDescriptor, ParamMap } from './types.js'

const photo: EndpointDescriptor = { name: 'photo-url', template: 'https://x/{type}/{member}', params: ['type', 'member'] }
const movedIn: EndpointDescriptor = {
  name: 'members-moved-in',
  template: 'https://x/unit/{unit}/moved-in/{arg0}',
  params: ['unit', 'arg0']
}
const unrecognized: Array<[EndpointDescriptor, ParamMap, string[]]> = [
  [{ name: 'a', template: 'https://x/{}/y', params: [] }, {}, ['{}']],
  [{ name: 'b', template: 'https://x/{member.id}', params: ['member.id'] }, { 'member.id': 7 }, ['{member.id}']],
  [{ name: 'c', template: 'https://x/{member id}', params: [] }, {}, ['{member id}']]
]

describe('placeholdersOf', () => {
  it('按出现顺序去重', () => {
    expect(placeholdersOf('https://x/{a}/{b}/{a}?q={c}')).toEqual(['a', 'b', 'c'])
  })
})

describe('unrecognizedPlaceholders', () => {
  it('找出不符合语法的 {…}', () => {
    expect(unrecognizedPlaceholders('https://x/{}/{member.id}/{member id}/{ok}')).toEqual([
      '{}',
      '{member.id}',
      '{member id}'
    ])
    expect(unrecognizedPlaceholders('https://x/{type}/{member}')).toEqual([])
  })
})

describe('splitArgs', () => {
  it('末尾对象作为关键字参数', () => {
    expect(splitArgs(['individual', 3, { member: 42 }])).toEqual({
      positional: ['individual', 3],
      params: { member: 42 }
    })
  })

  it('关键字参数对象不在末尾时报错', () => {
    expect(() => splitArgs([{ member: 42 }, 'individual'])).toThrow(TypeError)
  })
})

describe('resolveUrl', () => {
  it('位置参数按声明顺序填充，关键字参数按名填充', () => {
    expect(resolveUrl(photo, ['individual'], { member: 42 })).toBe('https://x/individual/42')
  })

  it('已由关键字提供的参数不占用位置参数', () => {
    expect(resolveUrl(photo, ['7'], { type: 'household' })).toBe('https://x/household/7')
  })

  it('缺少 unit 时使用会话 unit，位置参数跳过 unit', () => {
    expect(resolveUrl(movedIn, [2], {}, '5555')).toBe('https://x/unit/5555/moved-in/2')
  })

  it('显式 unit 优先于会话 unit', () => {
    expect(resolveUrl(movedIn, [2], { unit: '1234' }, '5555')).toBe('https://x/unit/1234/moved-in/2')
  })

  it('未登录且未提供 unit 时报 MissingParameterError', () => {
    expect(() => resolveUrl(movedIn, [2], {}, null)).toThrow(MissingParameterError)
  })

  it('列出全部缺失参数，不返回半成品 URL', () => {
    let caught: unknown
    try {
      resolveUrl(photo, [], {})
    } catch (e) {
      caught = e
    }
    expect(caught).toBeInstanceOf(MissingParameterError)
    if (caught instanceof MissingParameterError) {
      expect(caught.missing).toEqual(['type', 'member'])
      expect(caught.message).toBe('MISSING_PARAMETER: photo-url requires type, member')
    }
  })

  it('null/undefined 视为未提供', () => {
    expect(() => resolveUrl(photo, ['individual'], { member: null })).toThrow(MissingParameterError)
    expect(resolveUrl(photo, ['individual', 9], { member: undefined })).toBe('https://x/individual/9')
  })

  it('位置参数过多时报 TooManyArgumentsError', () => {
    expect(() => resolveUrl(photo, ['a', 'b', 'c'], {})).toThrow(TooManyArgumentsError)
  })

  it('替换值做 URL 编码', () => {
    expect(resolveUrl(photo, ['a b', 'c/d'], {})).toBe('https://x/a%20b/c%2Fd')
  })

  it('模板外的参数拼为 query string', () => {
    expect(resolveUrl(photo, ['individual', 42], { size: 'large' })).toBe('https://x/individual/42?size=large')
    const withQuery: EndpointDescriptor = { name: 'q', template: 'https://x/list?unitNumber={unit}', params: ['unit'] }
    expect(resolveUrl(withQuery, [], { page: 2 }, '5555')).toBe('https://x/list?unitNumber=5555&page=2')
  })

  it('声明但不在模板中的参数仍为必需，并进入 query string', () => {
    const desc: EndpointDescriptor = { name: 'search', template: 'https://x/search', params: ['term'] }
    expect(resolveUrl(desc, ['smith'], {})).toBe('https://x/search?term=smith')
    expect(() => resolveUrl(desc, [], {})).toThrow(MissingParameterError)
  })

  it.each(unrecognized)('模板残留无法识别的 {…} 时报 MissingParameterError：%#', (desc, params, expected) => {
    let caught: unknown
    try {
      resolveUrl(desc, [], params)
    } catch (e) {
      caught = e
    }
    expect(caught).toBeInstanceOf(MissingParameterError)
    if (caught instanceof MissingParameterError) expect(caught.missing).toEqual(expected)
  })

  it('替换值中的花括号会被编码，不视为残留', () => {
    expect(resolveUrl(photo, ['{a}', 'b'], {})).toBe('https://x/%7Ba%7D/b')
  })

  it('模板占位符未在 params 中声明时同样必需', () => {
    const desc: EndpointDescriptor = { name: 'loose', template: 'https://x/{id}', params: [] }
    expect(() => resolveUrl(desc, [], {})).toThrow(MissingParameterError)
    expect(resolveUrl(desc, [1], {})).toBe('https://x/1')
  })
})
