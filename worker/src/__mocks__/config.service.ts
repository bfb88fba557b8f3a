import { ConfigService } from '@nestjs/config';

/**
 * ConfigService over a nested configuration object, shaped like configuration.ts.
 * Keys left out fall back to the accessor defaults.
 */
export function createMockConfigService(values: Record<string, unknown> = {}): ConfigService {
  return new ConfigService(values);
}
