/**
 * Portable metadata filter expressions.
 *
 * Expressions are plain data so they can be built in code, parsed from text
 * and translated by a store-specific converter.
 */

export type FilterValue = string | number | boolean

export type ComparisonOperator = 'EQ' | 'NE' | 'GT' | 'GTE' | 'LT' | 'LTE'

export type MembershipOperator = 'IN' | 'NIN'

export interface ComparisonExpression {
  type: 'comparison'
  operator: ComparisonOperator
  key: string
  value: FilterValue
}

export interface MembershipExpression {
  type: 'membership'
  operator: MembershipOperator
  key: string
  values: FilterValue[]
}

export interface AndExpression {
  type: 'and'
  left: FilterExpression
  right: FilterExpression
}

export interface OrExpression {
  type: 'or'
  left: FilterExpression
  right: FilterExpression
}

export interface NotExpression {
  type: 'not'
  operand: FilterExpression
}

/** Explicit parentheses from the source text. */
export interface GroupExpression {
  type: 'group'
  content: FilterExpression
}

export type FilterExpression =
  | ComparisonExpression
  | MembershipExpression
  | AndExpression
  | OrExpression
  | NotExpression
  | GroupExpression

const comparison =
  (operator: ComparisonOperator) =>
  (key: string, value: FilterValue): ComparisonExpression => ({
    type: 'comparison',
    operator,
    key,
    value
  })

export const FilterExpressionBuilder = {
  eq: comparison('EQ'),
  ne: comparison('NE'),
  gt: comparison('GT'),
  gte: comparison('GTE'),
  lt: comparison('LT'),
  lte: comparison('LTE'),
  in: (key: string, ...values: FilterValue[]): MembershipExpression => ({
    type: 'membership',
    operator: 'IN',
    key,
    values
  }),
  nin: (key: string, ...values: FilterValue[]): MembershipExpression => ({
    type: 'membership',
    operator: 'NIN',
    key,
    values
  }),
  and: (left: FilterExpression, right: FilterExpression): AndExpression => ({
    type: 'and',
    left,
    right
  }),
  or: (left: FilterExpression, right: FilterExpression): OrExpression => ({
    type: 'or',
    left,
    right
  }),
  not: (operand: FilterExpression): NotExpression => ({
    type: 'not',
    operand
  }),
  group: (content: FilterExpression): GroupExpression => ({
    type: 'group',
    content
  })
}

/** Every metadata key an expression references, in order of appearance. */
export function collectFilterKeys(expression: FilterExpression): string[] {
  switch (expression.type) {
    case 'comparison':
    case 'membership':
      return [expression.key]
    case 'and':
    case 'or':
      return [
        ...collectFilterKeys(expression.left),
        ...collectFilterKeys(expression.right)
      ]
    case 'not':
      return collectFilterKeys(expression.operand)
    case 'group':
      return collectFilterKeys(expression.content)
  }
}
