/**
 * Attribute values carried on structure elements. Integers and
 * floating-point numbers share `number`; accessors distinguish them.
 */
export type AttributeValue = string | number | boolean | null | AttributeValue[];

export type AttributeMap = Readonly<Record<string, AttributeValue>>;

export const AttributeKey = {
  ALT: 'Alt',
  ACTUAL_TEXT: 'ActualText',
  LANG: 'Lang',
  TITLE: 'Title',
  LEVEL: 'Level',
  SUMMARY: 'Summary',
} as const;

export type AttributeKey = (typeof AttributeKey)[keyof typeof AttributeKey];

export function stringAttribute(attributes: AttributeMap, key: string): string | undefined {
  const value = attributes[key];
  return typeof value === 'string' ? value : undefined;
}

export function intAttribute(attributes: AttributeMap, key: string): number | undefined {
  const value = attributes[key];
  return typeof value === 'number' && Number.isInteger(value) ? value : undefined;
}

export function numberAttribute(attributes: AttributeMap, key: string): number | undefined {
  const value = attributes[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

export function booleanAttribute(attributes: AttributeMap, key: string): boolean | undefined {
  const value = attributes[key];
  return typeof value === 'boolean' ? value : undefined;
}

export function arrayAttribute(attributes: AttributeMap, key: string): AttributeValue[] | undefined {
  const value = attributes[key];
  return Array.isArray(value) ? value : undefined;
}

/** Returns the string value only when it has at least one character. */
export function nonEmptyStringAttribute(attributes: AttributeMap, key: string): string | undefined {
  const value = stringAttribute(attributes, key);
  return value ? value : undefined;
}
