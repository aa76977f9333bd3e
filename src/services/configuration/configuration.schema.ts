import { BASE_URL } from '@constants/api.const';
import { z } from 'zod';
import { SECRET_ENCODINGS } from './configuration.const';

export const credentialsSchema = z.object({
  key: z.string().min(1),
  secret: z.string().min(1),
  secretEncoding: z.enum(SECRET_ENCODINGS).default('utf8'),
});

export const configurationSchema = z.object({
  baseUrl: z.url({ protocol: /^https?$/ }).default(BASE_URL),
  credentials: credentialsSchema.optional(),
});
