import { FilterSyntaxError } from '@/shared/errors/vector-store-errors.js'
import {
  ComparisonOperator,
  FilterExpression,
  FilterExpressionBuilder as f,
  FilterValue,
  MembershipOperator
} from './filter-expression.js'

type TokenKind =
  | 'identifier'
  | 'string'
  | 'number'
  | 'operator'
  | 'and'
  | 'or'
  | 'bang'
  | 'lparen'
  | 'rparen'
  | 'lbracket'
  | 'rbracket'
  | 'comma'
  | 'eof'

interface Token {
  kind: TokenKind
  text: string
  position: number
}

const COMPARISON_OPERATORS: Record<string, ComparisonOperator> = {
  '==': 'EQ',
  '=': 'EQ',
  '!=': 'NE',
  '>': 'GT',
  '>=': 'GTE',
  '<': 'LT',
  '<=': 'LTE'
}

const PUNCTUATION: Record<string, TokenKind> = {
  '(': 'lparen',
  ')': 'rparen',
  '[': 'lbracket',
  ']': 'rbracket',
  ',': 'comma'
}

function tokenize(source: string): Token[] {
  const tokens: Token[] = []
  let i = 0

  while (i < source.length) {
    const char = source[i]

    if (/\s/.test(char)) {
      i++
      continue
    }

    const two = source.slice(i, i + 2)
    if (two === '&&' || two === '||') {
      tokens.push({ kind: two === '&&' ? 'and' : 'or', text: two, position: i })
      i += 2
      continue
    }
    if (two === '==' || two === '!=' || two === '>=' || two === '<=') {
      tokens.push({ kind: 'operator', text: two, position: i })
      i += 2
      continue
    }
    if (char === '=' || char === '>' || char === '<') {
      tokens.push({ kind: 'operator', text: char, position: i })
      i++
      continue
    }
    if (char === '!') {
      tokens.push({ kind: 'bang', text: char, position: i })
      i++
      continue
    }
    if (char in PUNCTUATION) {
      tokens.push({ kind: PUNCTUATION[char], text: char, position: i })
      i++
      continue
    }

    if (char === "'" || char === '"') {
      const start = i
      let value = ''
      i++
      while (i < source.length && source[i] !== char) {
        if (source[i] === '\\' && i + 1 < source.length) {
          i++
        }
        value += source[i]
        i++
      }
      if (i >= source.length) {
        throw new FilterSyntaxError('Unterminated string literal', start)
      }
      i++
      tokens.push({ kind: 'string', text: value, position: start })
      continue
    }

    const number = /^-?\d+(\.\d+)?([eE][+-]?\d+)?/.exec(source.slice(i))
    if (number) {
      tokens.push({ kind: 'number', text: number[0], position: i })
      i += number[0].length
      continue
    }

    const identifier = /^[A-Za-z_][A-Za-z0-9_.]*/.exec(source.slice(i))
    if (identifier) {
      const word = identifier[0]
      const lower = word.toLowerCase()
      const kind: TokenKind =
        lower === 'and' ? 'and' : lower === 'or' ? 'or' : 'identifier'
      tokens.push({ kind, text: word, position: i })
      i += word.length
      continue
    }

    throw new FilterSyntaxError(`Unexpected character '${char}'`, i)
  }

  tokens.push({ kind: 'eof', text: '', position: source.length })
  return tokens
}

class FilterParser {
  private index = 0

  constructor(private readonly tokens: Token[]) {}

  parse(): FilterExpression {
    const expression = this.parseOr()
    const next = this.peek()
    if (next.kind !== 'eof') {
      throw new FilterSyntaxError(`Unexpected '${next.text}'`, next.position)
    }
    return expression
  }

  private parseOr(): FilterExpression {
    let left = this.parseAnd()
    while (this.peek().kind === 'or') {
      this.advance()
      left = f.or(left, this.parseAnd())
    }
    return left
  }

  private parseAnd(): FilterExpression {
    let left = this.parseUnary()
    while (this.peek().kind === 'and') {
      this.advance()
      left = f.and(left, this.parseUnary())
    }
    return left
  }

  private parseUnary(): FilterExpression {
    const token = this.peek()
    if (token.kind === 'bang' || this.isKeyword(token, 'not')) {
      this.advance()
      return f.not(this.parseUnary())
    }
    return this.parsePrimary()
  }

  private parsePrimary(): FilterExpression {
    const token = this.peek()
    if (token.kind === 'lparen') {
      this.advance()
      const content = this.parseOr()
      this.expect('rparen', "')'")
      return f.group(content)
    }
    return this.parseCondition()
  }

  private parseCondition(): FilterExpression {
    const key = this.expect('identifier', 'a field name')
    const token = this.peek()

    if (token.kind === 'operator') {
      this.advance()
      return {
        type: 'comparison',
        operator: COMPARISON_OPERATORS[token.text],
        key: key.text,
        value: this.parseValue()
      }
    }

    let operator: MembershipOperator | null = null
    if (this.isKeyword(token, 'in')) {
      operator = 'IN'
    } else if (this.isKeyword(token, 'nin')) {
      operator = 'NIN'
    } else if (
      this.isKeyword(token, 'not') &&
      this.isKeyword(this.peek(1), 'in')
    ) {
      this.advance()
      operator = 'NIN'
    }

    if (!operator) {
      throw new FilterSyntaxError(
        `Expected a comparison operator after '${key.text}'`,
        token.position
      )
    }

    this.advance()
    const values = this.parseList()
    return operator === 'IN'
      ? f.in(key.text, ...values)
      : f.nin(key.text, ...values)
  }

  private parseList(): FilterValue[] {
    this.expect('lbracket', "'['")
    const values: FilterValue[] = []
    if (this.peek().kind !== 'rbracket') {
      values.push(this.parseValue())
      while (this.peek().kind === 'comma') {
        this.advance()
        values.push(this.parseValue())
      }
    }
    this.expect('rbracket', "']'")
    return values
  }

  private parseValue(): FilterValue {
    const token = this.advance()
    switch (token.kind) {
      case 'string':
        return token.text
      case 'number':
        return Number(token.text)
      case 'identifier':
        if (this.isKeyword(token, 'true')) return true
        if (this.isKeyword(token, 'false')) return false
        break
    }
    throw new FilterSyntaxError(
      token.kind === 'eof' ? 'Expected a value' : `Expected a value, got '${token.text}'`,
      token.position
    )
  }

  private isKeyword(token: Token, keyword: string): boolean {
    return token.kind === 'identifier' && token.text.toLowerCase() === keyword
  }

  private peek(offset = 0): Token {
    return this.tokens[Math.min(this.index + offset, this.tokens.length - 1)]
  }

  private advance(): Token {
    const token = this.peek()
    if (token.kind !== 'eof') {
      this.index++
    }
    return token
  }

  private expect(kind: TokenKind, description: string): Token {
    const token = this.peek()
    if (token.kind !== kind) {
      throw new FilterSyntaxError(
        token.kind === 'eof'
          ? `Expected ${description} but the expression ended`
          : `Expected ${description}, got '${token.text}'`,
        token.position
      )
    }
    return this.advance()
  }
}

/**
 * Parses the textual filter grammar, e.g.
 * `country in ['UK', 'NL'] && year >= 2020`.
 */
export function parseFilterExpression(source: string): FilterExpression {
  if (!source.trim()) {
    throw new FilterSyntaxError('Filter expression is empty', 0)
  }
  return new FilterParser(tokenize(source)).parse()
}
