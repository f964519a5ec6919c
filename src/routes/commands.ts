/**
 * Voice command matching route
 */
import { Router, type Router as ExpressRouter } from 'express';
import { ApiError } from '../middleware/error.js';
import { readBody, requireArray, requireString } from '../middleware/validate.js';
import { matchVoiceCommand } from '../services/voice-commands.js';

const router: ExpressRouter = Router();

/**
 * POST /api/commands/match
 */
router.post('/match', (req, res) => {
  const body = readBody(req);
  const text = requireString(body, 'text', { allowEmpty: true });
  const commands = requireArray(body, 'commands').map((command) => {
    if (typeof command !== 'string' || command.trim().length === 0) {
      throw new ApiError(400, 'commands must be non-empty strings');
    }
    return command.toLowerCase().trim();
  });

  res.json({ command: matchVoiceCommand(text, commands) });
});

export default router;
