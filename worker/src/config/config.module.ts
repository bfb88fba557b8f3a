import { Global, Module } from '@nestjs/common';
import { ProbeConfigService } from './probe.config';

@Global()
@Module({
  providers: [ProbeConfigService],
  exports: [ProbeConfigService],
})
export class ProbeConfigModule {}
