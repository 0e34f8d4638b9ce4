/**
 * Settings and connection-test handlers
 */
import type { Request, Response } from 'express';
import type { ProviderFactory } from '../providers/index.js';
import { validateSettings, type SettingsStore } from '../services/settings.js';
import { errorResponse, sendError } from './errors.js';

const PROBE_MESSAGE = 'Reply with the single word: ok';
const PROBE_MAX_TOKENS = 16;

export function handleGetSettings(_req: Request, res: Response, store: SettingsStore): void {
  const { provider, model, apiKey } = store.get();
  res.json({ provider, model, hasApiKey: apiKey !== '' });
}

export async function handleSaveSettings(req: Request, res: Response, store: SettingsStore): Promise<void> {
  try {
    const result = await store.update(req.body);
    if (!result.valid) {
      res.status(400).json({ error: 'Invalid settings', message: result.error });
      return;
    }
    res.json({ success: true, message: 'Settings updated successfully' });
  } catch (error) {
    sendError(res, error);
  }
}

export async function handleTestConnection(
  req: Request,
  res: Response,
  store: SettingsStore,
  providers: ProviderFactory,
  timeoutMs: number
): Promise<void> {
  const validation = validateSettings(req.body ?? {}, store.get());
  if (!validation.valid) {
    res.status(400).json({ success: false, message: validation.error });
    return;
  }

  const { provider, model, apiKey } = validation.settings;
  const startTime = Date.now();
  try {
    const client = providers({ provider, apiKey });
    await client.send({
      model,
      messages: [{ role: 'user', content: PROBE_MESSAGE }],
      maxTokens: PROBE_MAX_TOKENS,
      signal: AbortSignal.timeout(timeoutMs),
    });
    console.log(`[Provider] Connection test to ${provider}/${model} succeeded in ${Date.now() - startTime}ms`);
    res.json({ success: true, message: 'Connection test successful' });
  } catch (error) {
    const { status, body } = errorResponse(error);
    console.warn(`[Provider] Connection test to ${provider}/${model} failed: ${body.message}`);
    res.status(status).json({ success: false, message: body.message });
  }
}
