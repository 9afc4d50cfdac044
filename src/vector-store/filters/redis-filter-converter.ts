import {
  FilterTranslationError,
  UnknownFilterFieldError
} from '@/shared/errors/vector-store-errors.js'
import { MetadataField, MetadataFieldType } from '../vector-store-dtos.js'
import {
  ComparisonExpression,
  FilterExpression,
  FilterValue,
  MembershipExpression,
  collectFilterKeys
} from './filter-expression.js'

// Characters RediSearch treats as separators inside a tag value.
const TAG_SPECIAL_CHARACTERS = /[,.<>{}[\]"':;!@#$%^&*()\-+=~|/\\\s]/g

// Query syntax inside a text clause. Whitespace still separates terms.
const TEXT_SPECIAL_CHARACTERS = /[,.<>{}[\]"':;!@#$%^&*()\-+=~|/\\]/g

/**
 * Translates portable filter expressions into the RediSearch query grammar.
 * Every referenced key must be one of the declared metadata fields.
 */
export class RedisFilterExpressionConverter {
  private readonly fields: Map<string, MetadataFieldType>

  constructor(metadataFields: MetadataField[]) {
    this.fields = new Map(
      metadataFields.map((field): [string, MetadataFieldType] => [field.name, field.type])
    )
  }

  convert(expression: FilterExpression): string {
    for (const key of collectFilterKeys(expression)) {
      this.fieldType(key)
    }
    return this.render(expression)
  }

  private render(expression: FilterExpression): string {
    switch (expression.type) {
      case 'comparison':
        return this.convertComparison(expression)
      case 'membership':
        return this.convertMembership(expression)
      case 'and':
        return `${this.convertAndOperand(expression.left)} ${this.convertAndOperand(
          expression.right
        )}`
      case 'or':
        return `${this.render(expression.left)} | ${this.render(expression.right)}`
      case 'not':
        return expression.operand.type === 'group'
          ? `-${this.render(expression.operand)}`
          : `-(${this.render(expression.operand)})`
      case 'group':
        return `(${this.render(expression.content)})`
    }
  }

  // Intersection binds tighter than union.
  private convertAndOperand(expression: FilterExpression): string {
    const rendered = this.render(expression)
    return expression.type === 'or' ? `(${rendered})` : rendered
  }

  private convertComparison(expression: ComparisonExpression): string {
    const { key, operator, value } = expression
    const type = this.fieldType(key)

    if (type === 'NUMERIC') {
      const number = this.numericValue(key, value)
      switch (operator) {
        case 'EQ':
          return `@${key}:[${number} ${number}]`
        case 'NE':
          return `-@${key}:[${number} ${number}]`
        case 'GT':
          return `@${key}:[(${number} inf]`
        case 'GTE':
          return `@${key}:[${number} inf]`
        case 'LT':
          return `@${key}:[-inf (${number}]`
        case 'LTE':
          return `@${key}:[-inf ${number}]`
      }
    }

    if (operator !== 'EQ' && operator !== 'NE') {
      throw new FilterTranslationError(
        `Operator ${operator} is not supported on ${type} field ${key}`
      )
    }
    const negation = operator === 'NE' ? '-' : ''
    return `${negation}@${key}:${this.wrap(type, [value])}`
  }

  private convertMembership(expression: MembershipExpression): string {
    const { key, operator, values } = expression
    const type = this.fieldType(key)

    if (values.length === 0) {
      throw new FilterTranslationError(
        `${operator} on field ${key} needs at least one value`
      )
    }

    if (type === 'NUMERIC') {
      const alternatives = values
        .map((value) => this.numericValue(key, value))
        .map((number) => `@${key}:[${number} ${number}]`)
        .join(' | ')
      return operator === 'NIN' ? `-(${alternatives})` : `(${alternatives})`
    }

    const negation = operator === 'NIN' ? '-' : ''
    return `${negation}@${key}:${this.wrap(type, values)}`
  }

  private wrap(type: MetadataFieldType, values: FilterValue[]): string {
    if (type === 'TAG') {
      return `{${values.map((value) => escapeTag(String(value))).join(' | ')}}`
    }
    return `(${values.map((value) => escapeText(String(value))).join(' | ')})`
  }

  private fieldType(key: string): MetadataFieldType {
    const type = this.fields.get(key)
    if (!type) {
      throw new UnknownFilterFieldError(key, [...this.fields.keys()])
    }
    return type
  }

  private numericValue(key: string, value: FilterValue): number {
    if (typeof value !== 'number' || !Number.isFinite(value)) {
      throw new FilterTranslationError(
        `Field ${key} is NUMERIC but was compared with ${JSON.stringify(value)}`
      )
    }
    return value
  }
}

export function escapeTag(value: string): string {
  return value.replace(TAG_SPECIAL_CHARACTERS, (match) => `\\${match}`)
}

export function escapeText(value: string): string {
  return value.replace(TEXT_SPECIAL_CHARACTERS, (match) => `\\${match}`)
}
