import { z } from 'zod';
import { FEED_PROTOCOLS } from './camera.model';
import { parseAddress } from '../utils/ipAddress';

const level = z.number().int().min(0).max(100);

const pageNumber = z.coerce.number().int().min(1);

export const ipAddressSchema = z
  .string()
  .trim()
  .ip()
  .transform((value, ctx) => {
    const address = parseAddress(value);
    if (!address) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Invalid IP address' });
      return z.NEVER;
    }
    return address.toString();
  });

export const idParamSchema = z.string().uuid();

export const feedSetupSchema = z.object({
  protocol: z.enum(FEED_PROTOCOLS),
  port: z.number().int().min(1).max(65535),
  path: z.string().default('/'),
});

export const feedUpdateSchema = z.object({
  protocol: z.enum(FEED_PROTOCOLS).optional(),
  port: z.number().int().min(1).max(65535).optional(),
  path: z.string().optional(),
});

export const imageSettingsSchema = z.object({
  brightness: level.default(50),
  contrast: level.default(50),
  saturation: level.default(50),
});

export const networkSetupSchema = z.object({
  ipAddress: ipAddressSchema,
});

export const newCameraSchema = z.object({
  name: z.string().min(1),
  model: z.string().min(1),
  network: networkSetupSchema,
  imageSettings: imageSettingsSchema.default({}),
  feeds: z.array(feedSetupSchema).default([]),
});

export const cameraUpdateSchema = z.object({
  name: z.string().min(1).optional(),
  model: z.string().min(1).optional(),
  network: networkSetupSchema.optional(),
  imageSettings: z
    .object({
      brightness: level.optional(),
      contrast: level.optional(),
      saturation: level.optional(),
    })
    .optional(),
});

const booleanFlag = z.enum(['true', 'false']).transform((value) => value === 'true');

export const listCamerasQuerySchema = z.object({
  model: z.string().optional(),
  ipFrom: z.string().optional(),
  ipTo: z.string().optional(),
  online: booleanFlag.optional(),
  page: pageNumber.default(1),
  pageSize: pageNumber.default(20),
});

export const listFeedsQuerySchema = z.object({
  protocol: z.string().optional(),
  port: z.coerce.number().int().optional(),
  q: z.string().optional(),
  page: pageNumber.default(1),
  pageSize: pageNumber.default(20),
});
