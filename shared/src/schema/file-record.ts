import { z } from 'zod';
import { Flag } from '../enums';

export const FlagSchema = z.enum([Flag.PASS, Flag.FAIL]);

// One validated media file. audioCodec doubles as the failure reason on error records.
export const FileRecordSchema = z.object({
  name: z.string(),
  byteSize: z.number().int().nonnegative(),
  containerFormat: z.string(),
  videoCodec: z.string(),
  audioCodec: z.string(),
  formatFlag: FlagSchema,
  codecFlag: FlagSchema,
  sizeFlag: FlagSchema,
});

export type FileRecord = Readonly<z.infer<typeof FileRecordSchema>>;
