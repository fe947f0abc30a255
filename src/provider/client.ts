/**
 * Provider Client.
 *
 * Submits a text-to-video request to the external generation provider and
 * registers the returned task as QUEUED. Rendering happens out of process;
 * this client never polls. Completion arrives only through the callback.
 */

import { z } from 'zod';
import { ProviderConfig } from '../config';
import {
  ServiceError,
  maskSecretsInMessage,
  providerError,
  providerProtocolError,
  providerTimeoutError,
} from '../domain/errors';
import { TaskRegistry } from '../registry/task-registry';
import { Logger, logger as rootLogger } from '../logger';

/** Injectable fetch (tests pass a stub). */
export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

const submitResponse = z.object({
  code: z.union([z.number(), z.string()]).optional(),
  msg: z.string().nullable().optional(),
  data: z
    .object({ taskId: z.string().optional() })
    .passthrough()
    .nullable()
    .optional(),
});

/** Body sent to the jobs endpoint (grok-imagine family). */
export interface JobsCreateRequest {
  model: string;
  input: {
    prompt: string;
    aspect_ratio: string;
    duration: number;
    fps: number;
    mode: string;
  };
  callBackUrl: string;
}

/** Body sent to the veo generate endpoint. */
export interface VeoGenerateRequest {
  prompt: string;
  model: string;
  callBackUrl: string;
}

export type ProviderRequest = JobsCreateRequest | VeoGenerateRequest;

const MAX_ERROR_BODY_CHARS = 200;

export class ProviderClient {
  private log: Logger;

  constructor(
    private config: ProviderConfig,
    private registry: TaskRegistry,
    private fetchFn: FetchFn = (url, init) => fetch(url, init),
    log: Logger = rootLogger,
  ) {
    this.log = log.child({ module: 'provider' });
  }

  buildRequest(prompt: string): ProviderRequest {
    if (this.config.requestShape === 'veo') {
      return { prompt, model: this.config.model, callBackUrl: this.config.callbackUrl };
    }
    return {
      model: this.config.model,
      input: {
        prompt,
        aspect_ratio: this.config.aspectRatio,
        duration: this.config.durationSeconds,
        fps: this.config.fps,
        mode: this.config.mode,
      },
      callBackUrl: this.config.callbackUrl,
    };
  }

  /** Submit a prompt; returns the provider task id once the task is registered. */
  async submit(prompt: string, userId: string): Promise<string> {
    const response = await this.post(this.buildRequest(prompt));

    if (!response.ok) {
      const text = await response.text().catch(() => '');
      const suffix = text ? `: ${text.slice(0, MAX_ERROR_BODY_CHARS)}` : '';
      throw new ServiceError(
        providerError(this.mask(`Provider returned HTTP ${response.status}${suffix}`), response.status),
      );
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (err) {
      throw new ServiceError(providerProtocolError('Provider response is not JSON'), { cause: err });
    }

    const parsed = submitResponse.safeParse(payload);
    if (!parsed.success) {
      throw new ServiceError(
        providerProtocolError('Provider response has an unexpected shape', {
          issues: parsed.error.issues.map((issue) => issue.message),
        }),
      );
    }

    const { code, msg, data } = parsed.data;
    const numericCode = typeof code === 'string' ? Number.parseInt(code, 10) : code;
    if (numericCode !== undefined && numericCode !== 200) {
      throw new ServiceError(
        providerError(
          this.mask(`Provider rejected the request with code ${code}${msg ? `: ${msg}` : ''}`),
          Number.isFinite(numericCode) ? numericCode : undefined,
        ),
      );
    }

    const taskId = data?.taskId;
    if (!taskId) {
      throw new ServiceError(providerProtocolError('Provider response has no task id'));
    }

    await this.registry.create({ taskId, userId, prompt });
    this.log.info('Generation submitted', { taskId, userId, model: this.config.model });
    return taskId;
  }

  private async post(body: ProviderRequest): Promise<Response> {
    const timeoutMs = this.config.submitTimeoutMs;
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), timeoutMs);

    try {
      return await this.fetchFn(this.config.createUrl, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.config.apiKey}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify(body),
        signal: controller.signal,
      });
    } catch (err) {
      if (controller.signal.aborted) {
        throw new ServiceError(providerTimeoutError(timeoutMs), { cause: err });
      }
      const reason = err instanceof Error ? err.message : 'network error';
      throw new ServiceError(providerError(this.mask(`Provider request failed: ${reason}`)), { cause: err });
    } finally {
      clearTimeout(timeout);
    }
  }

  private mask(message: string): string {
    return maskSecretsInMessage(message, [this.config.apiKey]);
  }
}
