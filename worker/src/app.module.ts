import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import configuration from './config/configuration';
import { validateEnv } from './config/validation.schema';
import { ProbeConfigModule } from './config/config.module';
import { ProbeModule } from './probe/probe.module';
import { BridgeModule } from './bridge/bridge.module';
import { ReportModule } from './report/report.module';
import { SandboxModule } from './sandbox/sandbox.module';
import { HostModule } from './host/host.module';

@Module({
  imports: [
    // Configuration
    ConfigModule.forRoot({
      isGlobal: true,
      load: [configuration],
      validate: validateEnv,
      envFilePath: '.env',
    }),
    ProbeConfigModule,

    // Feature modules
    ProbeModule,
    BridgeModule,
    ReportModule,
    SandboxModule,
    HostModule,
  ],
})
export class AppModule {}
