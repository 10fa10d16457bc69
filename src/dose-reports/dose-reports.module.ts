import { Module } from '@nestjs/common';
import { DoseReportsService } from './dose-reports.service';
import { ReportAssemblerDomainService } from './domain/services/report-assembler.domain.service';
import {
  CT_DOSE_PATTERN_LIBRARY,
  CT_DOSE_PATTERN_LIBRARY_TOKEN,
} from './domain/patterns/pattern-library';
import { Pdf2JsonRendererAdapter } from './infrastructure/pdf-rendering/pdf2json-renderer.adapter';
import { FileSystemReportStoreAdapter } from './infrastructure/filesystem/file-report-store.adapter';
import { XlsxSpreadsheetAdapter } from './infrastructure/spreadsheet/xlsx-spreadsheet.adapter';

@Module({
  providers: [
    // Application layer
    DoseReportsService,

    // Domain layer
    ReportAssemblerDomainService,
    {
      provide: CT_DOSE_PATTERN_LIBRARY_TOKEN,
      useValue: CT_DOSE_PATTERN_LIBRARY,
    },

    // Infrastructure adapters
    {
      provide: 'DocumentRendererPort',
      useClass: Pdf2JsonRendererAdapter,
    },
    {
      provide: 'ReportStorePort',
      useClass: FileSystemReportStoreAdapter,
    },
    {
      provide: 'SpreadsheetWriterPort',
      useClass: XlsxSpreadsheetAdapter,
    },
  ],
  exports: [DoseReportsService],
})
export class DoseReportsModule {}
