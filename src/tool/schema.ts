// pattern: Functional Core

/**
 * Tool naming, JSON Schema derivation and argument validation.
 * Everything here is a pure function of an operation's declared parameters.
 */

import { z } from 'zod';
import type { OperationParameter, ParameterType } from '../connector/types.ts';
import type { ArgumentIssue } from '../errors/index.ts';
import type { JsonSchemaProperty, ToolInputSchema } from './types.ts';

export const MAX_TOOL_NAME_LENGTH = 64;

export function normalizeName(raw: string): string {
  return raw
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .replace(/([A-Z]+)([A-Z][a-z])/g, '$1_$2')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
}

/**
 * `<connector>_<operation>`, normalized and truncated to the length providers accept.
 */
export function toolName(connector: string, operation: string): string {
  const full = `${normalizeName(connector)}_${normalizeName(operation)}`;
  return full.slice(0, MAX_TOOL_NAME_LENGTH).replace(/_+$/, '');
}

function propertyFor(param: OperationParameter): JsonSchemaProperty {
  // Fixed key order keeps the serialized schema byte-stable.
  const property: JsonSchemaProperty = { type: param.type };
  if (param.description !== undefined) {
    property.description = param.description;
  }
  if (param.enum_values !== undefined) {
    property.enum = [...param.enum_values];
  }
  if (param.default !== undefined) {
    property.default = param.default;
  }
  if (param.minimum !== undefined) {
    property.minimum = param.minimum;
  }
  if (param.maximum !== undefined) {
    property.maximum = param.maximum;
  }
  if (param.type === 'array') {
    property.items = { type: param.items ?? 'string' };
  }
  return property;
}

export function deriveInputSchema(parameters: ReadonlyArray<OperationParameter>): ToolInputSchema {
  const properties: Record<string, JsonSchemaProperty> = {};
  const required: Array<string> = [];

  for (const param of parameters) {
    properties[param.name] = propertyFor(param);
    if (param.required) {
      required.push(param.name);
    }
  }

  return {
    type: 'object',
    properties,
    required,
    additionalProperties: false,
  };
}

function baseSchema(type: ParameterType, items: ParameterType | undefined): z.ZodTypeAny {
  switch (type) {
    case 'string':
      return z.string();
    case 'integer':
      return z.number().int();
    case 'number':
      return z.number();
    case 'boolean':
      return z.boolean();
    case 'object':
      return z.record(z.unknown());
    case 'array':
      return z.array(items === undefined ? z.string() : baseSchema(items, undefined));
  }
}

function fieldSchema(param: OperationParameter): z.ZodTypeAny {
  let schema = baseSchema(param.type, param.items);

  if (schema instanceof z.ZodNumber) {
    if (param.minimum !== undefined) {
      schema = schema.min(param.minimum);
    }
    if (param.maximum !== undefined && schema instanceof z.ZodNumber) {
      schema = schema.max(param.maximum);
    }
  }

  const allowed = param.enum_values;
  if (allowed !== undefined) {
    schema = schema.refine(
      (value: unknown) => allowed.some((candidate) => candidate === value),
      { message: `must be one of: ${allowed.join(', ')}` },
    );
  }

  if (param.default !== undefined) {
    return schema.default(param.default);
  }
  return param.required ? schema : schema.optional();
}

export type ArgumentValidator = (args: unknown) =>
  | { success: true; data: Record<string, unknown> }
  | { success: false; issues: Array<ArgumentIssue> };

export function createArgumentValidator(parameters: ReadonlyArray<OperationParameter>): ArgumentValidator {
  const shape: Record<string, z.ZodTypeAny> = {};
  for (const param of parameters) {
    shape[param.name] = fieldSchema(param);
  }
  const schema = z.object(shape).strict();

  return (args) => {
    const result = schema.safeParse(args ?? {});
    if (result.success) {
      return { success: true, data: result.data };
    }
    return {
      success: false,
      issues: result.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
      })),
    };
  };
}
