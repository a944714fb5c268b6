import { checkResource } from '../check/check';
import { diffResource } from '../differ';
import { isBridgeError, PropertyPathError, ResourceEvaluationError } from '../errors';
import type { Logger } from '../logger';
import { parsePropertyPath } from '../path/property-path';
import { type DiffResponse, toDiffResponse } from '../render/wire';
import type { ResourceSchema } from '../schema/types';
import { propagateOutputSecrets } from '../secrets/outputs';
import { objectValue, unknownValue } from '../value/builders';
import { decodeResource, encodeResource } from '../value/codec';
import type { ObjectValue, PlainObject, ValueTree } from '../value/types';
import type {
  CheckRequest,
  CheckResponse,
  CreateRequest,
  CreateResponse,
  DiffRequest,
  UpdateRequest,
  UpdateResponse,
  WrappedResource
} from './types';

export type ResourceBridgeOptions = {
  logger: Logger;
};

/**
 * Exposes one resource type of a wrapped provider through the RPC-shaped
 * operations of the host engine.
 *
 * Every operation is self-contained: values are decoded per call and nothing
 * mutable is shared between calls, so concurrent requests for different
 * resource instances need no coordination. Failures are logged and re-thrown
 * as {@link ResourceEvaluationError}.
 */
export class ResourceBridge {
  private readonly resource: ResourceSchema;
  private readonly provider: WrappedResource;
  private readonly logger: Logger;

  constructor(resource: ResourceSchema, provider: WrappedResource, options: ResourceBridgeOptions) {
    this.resource = resource;
    this.provider = provider;
    this.logger = options.logger.child({ resource: resource.token });
  }

  get token(): string {
    return this.resource.token;
  }

  /**
   * Validates a configuration; failures are reported, not thrown.
   */
  async check(request: CheckRequest): Promise<CheckResponse> {
    return this.evaluate('check', request.name, async logger => {
      const result = checkResource(this.resource, request.news, request.olds);
      for (const property of result.dropped) {
        logger.warn({ property }, 'dropping computed input that failed validation');
      }
      logger.debug({ failures: result.failures.length }, 'check finished');

      return {
        ...(result.inputs ? { inputs: encodeResource(result.inputs, { secrets: 'wrap' }) } : {}),
        failures: result.failures
      };
    });
  }

  /**
   * Computes the detailed diff between persisted state and checked inputs.
   * Unparsable ignore-change paths are skipped with a warning.
   */
  async diff(request: DiffRequest): Promise<DiffResponse> {
    return this.evaluate('diff', request.name, async logger => {
      const ignoreChanges = (request.ignoreChanges ?? []).filter(path => {
        try {
          parsePropertyPath(path);
          return true;
        } catch (error) {
          if (!(error instanceof PropertyPathError)) throw error;
          logger.warn({ path, reason: error.message }, 'ignoring unparsable ignoreChanges path');
          return false;
        }
      });

      const result = diffResource(
        this.resource,
        decodeResource(this.resource, request.olds),
        decodeResource(this.resource, request.news),
        { ignoreChanges, replaceOverride: request.replaceOverride }
      );

      logger.debug(
        { id: request.id, entries: result.entries.length, replace: result.replace },
        'diff finished'
      );
      return toDiffResponse(this.resource, result);
    });
  }

  /**
   * Creates the resource, or plans its creation during preview.
   */
  async create(request: CreateRequest): Promise<CreateResponse> {
    return this.evaluate('create', request.name, async logger => {
      const inputs = decodeResource(this.resource, request.inputs);

      if (request.preview) {
        logger.debug('create planned');
        return { id: '', properties: this.plannedProperties(inputs) };
      }

      const created = await this.provider.create(encodeResource(inputs, { secrets: 'strip' }));
      const outputs = propagateOutputSecrets(this.resource, {
        inputs,
        outputs: decodeResource(this.resource, created.outputs)
      });

      logger.debug({ id: created.id }, 'create finished');
      return { id: created.id, properties: encodeResource(outputs, { secrets: 'wrap' }) };
    });
  }

  /**
   * Updates the resource in place, or plans the update during preview.
   */
  async update(request: UpdateRequest): Promise<UpdateResponse> {
    return this.evaluate('update', request.name, async logger => {
      const olds = decodeResource(this.resource, request.olds);
      const news = decodeResource(this.resource, request.news);

      if (request.preview) {
        logger.debug({ id: request.id }, 'update planned');
        return { properties: this.plannedProperties(news) };
      }

      const updated = await this.provider.update(
        request.id,
        encodeResource(olds, { secrets: 'strip' }),
        encodeResource(news, { secrets: 'strip' })
      );
      const outputs = propagateOutputSecrets(this.resource, {
        inputs: news,
        prior: olds,
        outputs: decodeResource(this.resource, updated)
      });

      logger.debug({ id: request.id }, 'update finished');
      return { properties: encodeResource(outputs, { secrets: 'wrap' }) };
    });
  }

  /**
   * Planned outputs: the inputs, with every computed top-level field the
   * configuration leaves out reported as unknown.
   */
  private plannedProperties(inputs: ObjectValue): PlainObject {
    const fields = new Map<string, ValueTree>(inputs.fields);
    for (const [key, node] of Object.entries(this.resource.fields)) {
      const value = fields.get(key);
      if (node.computed && (!value || value.kind === 'null')) {
        fields.set(key, unknownValue());
      }
    }

    const planned = propagateOutputSecrets(this.resource, {
      inputs,
      outputs: objectValue(fields, inputs.secret)
    });
    return encodeResource(planned, { secrets: 'wrap' });
  }

  private async evaluate<T>(
    operation: string,
    name: string,
    run: (logger: Logger) => Promise<T>
  ): Promise<T> {
    const logger = this.logger.child({ instance: name, operation });
    logger.debug('%s started', operation);

    try {
      return await run(logger);
    } catch (error) {
      logger.error(
        { err: error, code: isBridgeError(error) ? error.code : undefined },
        '%s failed',
        operation
      );
      throw new ResourceEvaluationError(this.resource.token, operation, error);
    }
  }
}
