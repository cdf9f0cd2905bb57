import { Hono } from 'hono';
import { z } from 'zod';
import { generatePersonas } from '../agent/architect.js';
import type { CompletionGateway } from '../agent/loop.js';
import { PRESET_PERSONAS } from '../agent/personas.js';
import { ConfigurationError } from '../lib/errors.js';
import { parseJsonBodyWithLimit } from '../lib/http-body-guard.js';
import { validateBody } from '../lib/validate.js';
import logger from '../lib/logger.js';

const GeneratePersonasSchema = z.object({
  market_segment: z.string().trim().min(1).max(2_000),
  num_personas: z.number().int().min(1).max(10).default(3),
});

export interface PersonaRouteDeps {
  createGateway: () => CompletionGateway;
  maxBodyBytes: number;
}

export function createPersonaRoutes(deps: PersonaRouteDeps): Hono {
  const routes = new Hono();

  routes.get('/personas/presets', (c) => c.json({ personas: [...PRESET_PERSONAS] }));

  // POST /generate-personas: ask the model for personas of a market segment
  routes.post('/generate-personas', async (c) => {
    const body = await parseJsonBodyWithLimit(c, deps.maxBodyBytes);
    if (!body.ok) return body.response;

    const parsed = validateBody(GeneratePersonasSchema, body.data);
    if (!parsed.success) {
      return c.json({ error: 'Invalid request', details: parsed.issues }, 400);
    }

    let gateway: CompletionGateway;
    try {
      gateway = deps.createGateway();
    } catch (err) {
      if (err instanceof ConfigurationError) {
        logger.error({ error: err.message }, 'Persona generation unavailable');
        return c.json({ error: err.message }, 503);
      }
      throw err;
    }

    const { market_segment, num_personas } = parsed.data;
    const personas = await generatePersonas(gateway, market_segment, num_personas, c.req.raw.signal);
    if (personas.length === 0) {
      return c.json({ error: 'Failed to generate personas' }, 500);
    }
    return c.json({ personas });
  });

  return routes;
}
