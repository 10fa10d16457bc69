import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import doseReportsConfig from './dose-reports/config/dose-reports.config';
import { DoseReportsModule } from './dose-reports/dose-reports.module';
import { CliModule } from './cli/cli.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [doseReportsConfig],
      envFilePath: ['.env'],
    }),
    DoseReportsModule,
    CliModule,
  ],
})
export class AppModule {}
