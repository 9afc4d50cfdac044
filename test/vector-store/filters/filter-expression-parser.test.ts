import { parseFilterExpression } from '@/vector-store/filters/filter-expression-parser.js'
import { FilterExpressionBuilder as f } from '@/vector-store/filters/filter-expression.js'
import { FilterSyntaxError } from '@/shared/errors/vector-store-errors.js'

describe('parseFilterExpression', () => {
  it('parses membership combined with a numeric comparison', () => {
    expect(parseFilterExpression("country in ['UK', 'NL'] && year >= 2020")).toEqual(
      f.and(f.in('country', 'UK', 'NL'), f.gte('year', 2020))
    )
  })

  it('maps every comparison operator', () => {
    expect(parseFilterExpression('a == 1')).toEqual(f.eq('a', 1))
    expect(parseFilterExpression('a = 1')).toEqual(f.eq('a', 1))
    expect(parseFilterExpression('a != 1')).toEqual(f.ne('a', 1))
    expect(parseFilterExpression('a > 1')).toEqual(f.gt('a', 1))
    expect(parseFilterExpression('a >= 1')).toEqual(f.gte('a', 1))
    expect(parseFilterExpression('a < 1')).toEqual(f.lt('a', 1))
    expect(parseFilterExpression('a <= 1')).toEqual(f.lte('a', 1))
  })

  it('reads strings, negative decimals and booleans', () => {
    expect(parseFilterExpression('name == "it\'s"')).toEqual(f.eq('name', "it's"))
    expect(parseFilterExpression('score > -1.5')).toEqual(f.gt('score', -1.5))
    expect(parseFilterExpression('published == true')).toEqual(
      f.eq('published', true)
    )
    expect(parseFilterExpression('draft == FALSE')).toEqual(f.eq('draft', false))
  })

  it('accepts nin and not in', () => {
    expect(parseFilterExpression("genre nin ['drama']")).toEqual(
      f.nin('genre', 'drama')
    )
    expect(parseFilterExpression("genre not in ['drama', 'comedy']")).toEqual(
      f.nin('genre', 'drama', 'comedy')
    )
  })

  it('binds and tighter than or', () => {
    expect(parseFilterExpression('a == 1 or b == 2 and c == 3')).toEqual(
      f.or(f.eq('a', 1), f.and(f.eq('b', 2), f.eq('c', 3)))
    )
    expect(parseFilterExpression('a == 1 || b == 2 && c == 3')).toEqual(
      f.or(f.eq('a', 1), f.and(f.eq('b', 2), f.eq('c', 3)))
    )
  })

  it('keeps parentheses and negation', () => {
    expect(parseFilterExpression('(a == 1 || b == 2) && c == 3')).toEqual(
      f.and(f.group(f.or(f.eq('a', 1), f.eq('b', 2))), f.eq('c', 3))
    )
    expect(parseFilterExpression('not (a == 1)')).toEqual(
      f.not(f.group(f.eq('a', 1)))
    )
    expect(parseFilterExpression('!a == 1')).toEqual(f.not(f.eq('a', 1)))
  })

  it('reports where the text stops making sense', () => {
    expect(() => parseFilterExpression('')).toThrow(
      new FilterSyntaxError('Filter expression is empty', 0)
    )
    expect(() => parseFilterExpression('year >=')).toThrow(
      'Expected a value at position 7'
    )
    expect(() => parseFilterExpression('year 2020')).toThrow(
      "Expected a comparison operator after 'year' at position 5"
    )
    expect(() => parseFilterExpression('(a == 1')).toThrow(
      "Expected ')' but the expression ended at position 7"
    )
    expect(() => parseFilterExpression("a == 'x")).toThrow(
      'Unterminated string literal at position 5'
    )
    expect(() => parseFilterExpression('a == 1 b == 2')).toThrow(
      "Unexpected 'b' at position 7"
    )
    expect(() => parseFilterExpression('a == 1 # b')).toThrow(
      "Unexpected character '#' at position 7"
    )
  })

  it('raises FilterSyntaxError with the offending position', () => {
    try {
      parseFilterExpression('a in 1')
      expect.unreachable()
    } catch (error) {
      expect(error).toBeInstanceOf(FilterSyntaxError)
      expect(error).toMatchObject({ position: 5, code: 'filter_syntax_error' })
    }
  })
})
