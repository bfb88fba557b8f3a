import { Module } from '@nestjs/common';
import { BridgeModule } from '../bridge/bridge.module';
import { ProbeModule } from '../probe/probe.module';
import { SandboxService } from './sandbox.service';

@Module({
  imports: [ProbeModule, BridgeModule],
  providers: [SandboxService],
  exports: [SandboxService],
})
export class SandboxModule {}
