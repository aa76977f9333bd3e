import type { z } from 'zod';
import type { configurationSchema } from '../services/configuration/configuration.schema';

export type Configuration = z.infer<typeof configurationSchema>;
