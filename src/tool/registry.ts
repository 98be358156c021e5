// pattern: Imperative Shell

/**
 * ToolRegistry implementation.
 * Derives descriptors from connector operations, enforces global name uniqueness,
 * and validates arguments before any handler runs.
 */

import type { Connector, Operation } from '../connector/types.ts';
import { DuplicateToolNameError, ToolArgumentError, UnknownToolError } from '../errors/index.ts';
import type { Logger } from '../logging/logger.ts';
import { componentLogger } from '../logging/logger.ts';
import { createArgumentValidator, deriveInputSchema, toolName } from './schema.ts';
import type { ArgumentValidator } from './schema.ts';
import type { ToolDescriptor, ToolInvocation, ToolRegistry } from './types.ts';

type Entry = {
  descriptor: ToolDescriptor;
  validate: ArgumentValidator;
};

export function createToolRegistry(options: { logger?: Logger } = {}): ToolRegistry {
  const log = componentLogger('tools', options.logger);
  const entries = new Map<string, Entry>();

  function describeOperation(operation: Operation, connector: Connector): Entry {
    const opLog = log.child({ connector: connector.name, operation: operation.name });
    const descriptor: ToolDescriptor = {
      name: toolName(connector.name, operation.name),
      connector: connector.name,
      operation: operation.name,
      description: operation.description,
      category: operation.category,
      parameters: operation.parameters,
      input_schema: deriveInputSchema(operation.parameters),
      idempotent: operation.idempotent,
      independent: operation.independent,
      handler: (args, context) =>
        operation.handler(args, {
          connector,
          invocation_id: context.invocation_id,
          signal: context.signal,
          logger: opLog,
        }),
    };
    Object.freeze(descriptor);
    return { descriptor, validate: createArgumentValidator(operation.parameters) };
  }

  function findOperation(connector: Connector, name: string): Operation {
    const operation = connector.operations().find((op) => op.name === name);
    if (!operation) {
      throw new Error(`connector ${connector.name} has no operation ${name}`);
    }
    return operation;
  }

  function commit(batch: ReadonlyArray<Entry>): Array<ToolDescriptor> {
    const seen = new Set<string>();
    for (const { descriptor } of batch) {
      if (entries.has(descriptor.name) || seen.has(descriptor.name)) {
        throw new DuplicateToolNameError(descriptor.name);
      }
      seen.add(descriptor.name);
    }
    for (const entry of batch) {
      entries.set(entry.descriptor.name, entry);
      log.debug({ tool: entry.descriptor.name }, 'tool registered');
    }
    return batch.map((entry) => entry.descriptor);
  }

  return {
    register(operation: string, connector: Connector): ToolDescriptor {
      const [descriptor] = commit([describeOperation(findOperation(connector, operation), connector)]);
      if (!descriptor) {
        throw new Error(`registration of ${operation} produced no descriptor`);
      }
      return descriptor;
    },

    registerConnector(connector: Connector): Array<ToolDescriptor> {
      return commit(connector.operations().map((op) => describeOperation(op, connector)));
    },

    async invoke(invocation: ToolInvocation): Promise<unknown> {
      const entry = entries.get(invocation.name);
      if (!entry) {
        throw new UnknownToolError(invocation.name);
      }

      if (invocation.invalid_arguments && invocation.invalid_arguments.length > 0) {
        throw new ToolArgumentError(invocation.name, invocation.invalid_arguments);
      }

      const validation = entry.validate(invocation.arguments);
      if (!validation.success) {
        log.debug({ tool: invocation.name, invocation_id: invocation.id, issues: validation.issues }, 'arguments rejected');
        throw new ToolArgumentError(invocation.name, validation.issues);
      }

      log.debug({ tool: invocation.name, invocation_id: invocation.id }, 'invoking tool');
      try {
        return await entry.descriptor.handler(validation.data, {
          invocation_id: invocation.id,
          signal: invocation.signal,
        });
      } catch (error) {
        log.warn(
          {
            tool: invocation.name,
            invocation_id: invocation.id,
            error: error instanceof Error ? error.message : String(error),
          },
          'tool failed',
        );
        throw error;
      }
    },

    list(): ReadonlyArray<ToolDescriptor> {
      return Object.freeze(Array.from(entries.values(), (entry) => entry.descriptor));
    },

    get(name: string): ToolDescriptor | undefined {
      return entries.get(name)?.descriptor;
    },
  };
}
