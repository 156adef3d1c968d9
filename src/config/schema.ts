import { z } from 'zod';

const TelegramSchema = z.object({
  token: z.string().optional(),
  allowlist: z.array(z.string()).default([]),
  pollTimeoutSec: z.number().int().nonnegative().default(30),
  retryDelayMs: z.number().default(5000),
  fileBaseUrl: z.string().default('https://api.telegram.org/file'),
});

const CommandSchema = z.array(z.string()).min(1);

const WorkerCommandsSchema = z.object({
  image: CommandSchema.default(['python', 'workers/image_generation.py']),
  image_variation: CommandSchema.default(['python', 'workers/image_variation.py']),
  text_completion: CommandSchema.default(['python', 'workers/completion_generation.py']),
  text_edit: CommandSchema.default(['python', 'workers/edit_text.py']),
});

const WorkerSchema = z.object({
  apiKey: z.string().default(''),
  organization: z.string().default(''),
  commands: WorkerCommandsSchema.optional().transform(v => WorkerCommandsSchema.parse(v ?? {})),
});

const OutputsSchema = z.object({
  dir: z.string().default('outputs'),
  requestsLog: z.string().default('outputs/requests.log'),
});

const RepliesSchema = z.object({
  mention: z.string().default('Leave me alone!'),
  stats: z.string().default('42!'),
  unknownCommand: z.string().default("I don't understand that command."),
  failure: z.string().default('Something went wrong. :-('),
  help: z.string().default(
    '/image <request> — draw a picture (reply to a photo to make a variation)\n'
    + '/text <request> — write a text (reply to a text to edit it)\n'
    + '/stats — statistics',
  ),
});

export const MuseConfigSchema = z.object({
  telegram: TelegramSchema.optional().transform(v => TelegramSchema.parse(v ?? {})),
  worker: WorkerSchema.optional().transform(v => WorkerSchema.parse(v ?? {})),
  outputs: OutputsSchema.optional().transform(v => OutputsSchema.parse(v ?? {})),
  replies: RepliesSchema.optional().transform(v => RepliesSchema.parse(v ?? {})),
});

export type MuseConfig = z.infer<typeof MuseConfigSchema>;
export type WorkerCommands = z.infer<typeof WorkerCommandsSchema>;
export type Replies = z.infer<typeof RepliesSchema>;
