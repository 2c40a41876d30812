import { Hono, type Context } from 'hono';
import type { ConfigProvider } from '../config/config.js';
import { failed, type PipelineResult } from '../pipeline/types.js';
import { ValidationError, errorMessage } from '../errors.js';
import { isRecord, nonEmptyString } from '../utils/guards.js';
import * as log from '../utils/logger.js';

export interface PipelineLike {
  run(payload: unknown): Promise<PipelineResult>;
}

export interface ServerAppOptions {
  pipeline: PipelineLike;
  config: ConfigProvider;
}

export function createServerApp(options: ServerAppOptions): Hono {
  const app = new Hono();

  app.get('/health', async (c) => {
    try {
      const config = await options.config.get();
      return c.json({ ok: true, provider: config.inference.provider, model: config.inference.model });
    } catch (err) {
      return c.json({ ok: false, error: errorMessage(err) }, 500);
    }
  });

  app.post('/webhook', async (c) => {
    let payload: unknown;
    try {
      payload = JSON.parse(await c.req.text());
    } catch {
      log.warn('Webhook: body is not JSON');
      return c.json(failed('invalid JSON body'));
    }

    try {
      const result = await options.pipeline.run(payload);
      return c.json(result);
    } catch (err) {
      log.error(`Webhook failed: ${errorMessage(err)}`);
      return c.json({ status: 'error', reason: errorMessage(err) }, 500);
    }
  });

  const updateConfig = async (c: Context) => {
    let body: unknown;
    try {
      body = JSON.parse(await c.req.text());
    } catch {
      body = {};
    }

    const systemMessage = isRecord(body) ? nonEmptyString(body.system_message) : undefined;
    const model = isRecord(body) ? nonEmptyString(body.model) : undefined;
    if (!systemMessage && !model) {
      return c.json({ error: 'No system_message or model provided' }, 400);
    }

    try {
      await options.config.update({ systemMessage, model });
    } catch (err) {
      if (err instanceof ValidationError) {
        return c.json({ error: err.message }, 400);
      }
      log.error(`Config update failed: ${errorMessage(err)}`);
      return c.json({ error: errorMessage(err) }, 500);
    }

    return c.json({
      message: 'Settings updated successfully',
      system_message: systemMessage ?? 'unchanged',
      model: model ?? 'unchanged',
    });
  };

  app.post('/update_config', updateConfig);
  app.post('/update_system_message', updateConfig);

  return app;
}
