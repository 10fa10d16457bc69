import { Module } from '@nestjs/common';
import { DoseReportsModule } from '../dose-reports/dose-reports.module';
import { ExtractReportsCommand } from './commands/extract-reports.command';
import { ExportSpreadsheetCommand } from './commands/export-spreadsheet.command';

@Module({
  imports: [DoseReportsModule],
  providers: [ExtractReportsCommand, ExportSpreadsheetCommand],
  exports: [ExtractReportsCommand, ExportSpreadsheetCommand],
})
export class CliModule {}
