import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AllConfigType } from '../../../config/config.type';
import { Acquisition, DoseReport } from '../entities/dose-report.entity';
import {
  CT_DOSE_PATTERN_LIBRARY_TOKEN,
  CtDosePatternLibrary,
} from '../patterns/pattern-library';
import { createFieldReader } from '../../utils/field-matcher';
import {
  AcquisitionBlock,
  AcquisitionSegmenter,
} from '../../utils/acquisition-segmenter';
import { normalizeReportText } from '../../utils/text-normalizer';
import { deepFreeze } from '../../utils/deep-freeze';

/**
 * ReportAssemblerDomainService
 *
 * Builds one DoseReport from the text of one rendered document:
 * 1. hospital / report date from the first header lines
 * 2. essential, device and irradiation fields from the full text
 * 3. acquisition blocks from the configured marker policies
 * 4. acquisition fields from each block only
 *
 * A missing field is null and never aborts assembly. The result is frozen.
 *
 * PHI: only field names and counts are logged, never captured values.
 */
@Injectable()
export class ReportAssemblerDomainService {
  private readonly logger = new Logger(ReportAssemblerDomainService.name);

  private readonly segmenter: AcquisitionSegmenter;

  private readonly headerScanLines: number;

  constructor(
    @Inject(CT_DOSE_PATTERN_LIBRARY_TOKEN)
    private readonly patterns: CtDosePatternLibrary,
    private readonly configService: ConfigService<AllConfigType>,
  ) {
    this.segmenter = AcquisitionSegmenter.fromPolicies(
      patterns,
      this.configService.getOrThrow('doseReports.acquisitionMarkers', {
        infer: true,
      }),
    );
    this.headerScanLines = this.configService.getOrThrow(
      'doseReports.headerScanLines',
      { infer: true },
    );
  }

  /**
   * Normalizes raw rendered text, then assembles it.
   */
  assembleRaw(rawText: string): DoseReport {
    return this.assemble(normalizeReportText(rawText));
  }

  assemble(normalizedText: string): DoseReport {
    const read = createFieldReader(normalizedText);
    const readHeader = createFieldReader(this.headerOf(normalizedText));
    const { header, essential, device, irradiation } = this.patterns;

    const report: DoseReport = {
      hospital: readHeader(header.hospital),
      reportDate: readHeader(header.reportDate),
      essential: {
        patientId: read(essential.patientId),
        studyId: read(essential.studyId),
        accessionNumber: read(essential.accessionNumber),
        studyDate: read(essential.studyDate),
        birthDate: read(essential.birthDate),
        sex: read(essential.sex),
      },
      device: {
        observerName: read(device.observerName),
        manufacturer: read(device.manufacturer),
        modelName: read(device.modelName),
        serialNumber: read(device.serialNumber),
        physicalLocation: read(device.physicalLocation),
      },
      irradiation: {
        startTime: read(irradiation.startTime),
        endTime: read(irradiation.endTime),
        totalEvents: read(irradiation.totalEvents),
        totalDlp: read(irradiation.totalDlp),
      },
      acquisitions: this.segmenter
        .segment(normalizedText)
        .map((block) => this.assembleAcquisition(block)),
    };

    this.logMissingFields(report);
    return deepFreeze(report);
  }

  private assembleAcquisition(block: AcquisitionBlock): Acquisition {
    const read = createFieldReader(block.text);
    const { acquisition, acquisitionParams, xraySource, ctDose } =
      this.patterns;

    return {
      protocol: read(acquisition.protocol),
      targetRegion: read(acquisition.targetRegion),
      acquisitionType: read(acquisition.acquisitionType),
      procedureContext: read(acquisition.procedureContext),
      irradiationEventUid: read(acquisition.irradiationEventUid),
      comment: read(acquisition.comment),
      acquisitionParams: {
        exposureTime: read(acquisitionParams.exposureTime),
        scanningLength: read(acquisitionParams.scanningLength),
        nominalSingleCollimation: read(
          acquisitionParams.nominalSingleCollimation,
        ),
        nominalTotalCollimation: read(
          acquisitionParams.nominalTotalCollimation,
        ),
        numXraySources: read(acquisitionParams.numXraySources),
        pitchFactor: read(acquisitionParams.pitchFactor),
      },
      xraySourceParams: {
        identification: read(xraySource.identification),
        kvp: read(xraySource.kvp),
        maxTubeCurrent: read(xraySource.maxTubeCurrent),
        tubeCurrent: read(xraySource.tubeCurrent),
        exposureTimePerRotation: read(xraySource.exposureTimePerRotation),
      },
      ctDose: {
        meanCtdivol: read(ctDose.meanCtdivol),
        phantomType: read(ctDose.phantomType),
        dlp: read(ctDose.dlp),
        sizeSpecificDose: read(ctDose.sizeSpecificDose),
        ctdivolAlertValue: read(ctDose.ctdivolAlertValue),
        waterEquivalentDiameter: read(ctDose.waterEquivalentDiameter),
      },
    };
  }

  private headerOf(normalizedText: string): string {
    return normalizedText
      .split('\n')
      .filter((line) => line !== '')
      .slice(0, this.headerScanLines)
      .join('\n');
  }

  private logMissingFields(report: DoseReport): void {
    const missing = [
      ...missingKeys('header', {
        hospital: report.hospital,
        reportDate: report.reportDate,
      }),
      ...missingKeys('essential', report.essential),
      ...missingKeys('device', report.device),
      ...missingKeys('irradiation', report.irradiation),
    ];

    this.logger.debug(
      `[ASSEMBLE] acquisitions=${report.acquisitions.length}, missing=${missing.length > 0 ? missing.join(',') : 'none'}`,
    );
  }
}

function missingKeys(
  group: string,
  values: object,
): string[] {
  return Object.entries(values)
    .filter(([, value]) => value === null)
    .map(([key]) => `${group}.${key}`);
}
