import { Module } from '@nestjs/common';
import { ReportModule } from '../report/report.module';
import { SandboxModule } from '../sandbox/sandbox.module';
import { HostService } from './host.service';
import { ForkedSandboxLauncher, SandboxLauncher } from './sandbox-launcher';

@Module({
  imports: [SandboxModule, ReportModule],
  providers: [HostService, { provide: SandboxLauncher, useClass: ForkedSandboxLauncher }],
  exports: [HostService],
})
export class HostModule {}
