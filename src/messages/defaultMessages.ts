/**
 * Built-in English templates, keyed by message id.
 * `{name}` placeholders are replaced by the parameter of the same name.
 */

export const DEFAULT_LOCALE = 'en-US';

export const DEFAULT_MESSAGES: Readonly<Record<string, string>> = {
  'range-minimum': 'the number must be `>= {minimum}`.',
  'range-maximum': 'the number must be `<= {maximum}`.',
  'range-exclusive-minimum': 'the number must be `> {exclusiveMinimum}`.',
  'range-exclusive-maximum': 'the number must be `< {exclusiveMaximum}`.',
  'non-finite': 'the number must be finite, got `{actual}`.',
  'multiple-of': 'the value must be multiple of `{multipleOf}`.',
  'length-min-length': 'the length of the value must be `>= {minLength}`.',
  'length-max-length': 'the length of the value must be `<= {maxLength}`.',
  'pattern': 'the value must match the pattern of "{pattern}".',
  'enumerate': 'the value must be in [{values}].',
  'items-min-items': 'the length of the items must be `>= {minItems}`.',
  'items-max-items': 'the length of the items must be `<= {maxItems}`.',
  'unique-items': 'the items must be unique (items {first} and {duplicate} are equal).',
  'contains-min-contains': 'the items must contain `>= {minContains}` matching values.',
  'contains-max-contains': 'the items must contain `<= {maxContains}` matching values.',
  'properties-min-properties': 'the size of the properties must be `>= {minProperties}`.',
  'properties-max-properties': 'the size of the properties must be `<= {maxProperties}`.',
  'type': 'the value must be of type `{expected}`, got `{actual}`.',
  'required': 'the property `{property}` is required.',
  'unexpected-property': 'the property `{property}` is not allowed.',
  'custom': '{message}',
  'any-of': 'the value must match at least one of {branches} alternatives.',
  'one-of-none': 'the value must match exactly one of {branches} alternatives, but matched none.',
  'one-of-multiple': 'the value must match exactly one alternative, but matched {matched} (alternatives {matchedIndices}).',
  'not': 'the value must not match the negated rule.',
};
