import { plainToInstance } from 'class-transformer';
import { validateSync, ValidationError } from 'class-validator';
import {
  Acquisition,
  DoseReport,
  FieldValue,
} from '../domain/entities/dose-report.entity';
import { ReportInputError } from '../domain/errors/report-input.error';
import {
  AcquisitionJsonDto,
  AcquisitionParamsJsonDto,
  CtDoseJsonDto,
  DeviceJsonDto,
  DoseReportJsonDto,
  EssentialJsonDto,
  IrradiationJsonDto,
  XraySourceParamsJsonDto,
} from '../dto/dose-report-json.dto';
import { deepFreeze } from '../utils/deep-freeze';

export interface AcquisitionJson {
  protocol: FieldValue;
  target_region: FieldValue;
  acquisition_type: FieldValue;
  procedure_context: FieldValue;
  irradiation_event_uid: FieldValue;
  comment: FieldValue;
  acquisition_params: {
    exposure_time: FieldValue;
    scanning_length: FieldValue;
    nominal_single_collimation: FieldValue;
    nominal_total_collimation: FieldValue;
    num_xray_sources: FieldValue;
    pitch_factor: FieldValue;
  };
  xray_source_params: {
    identification: FieldValue;
    kvp: FieldValue;
    max_tube_current: FieldValue;
    tube_current: FieldValue;
    exposure_time_per_rotation: FieldValue;
  };
  ct_dose: {
    mean_ctdivol: FieldValue;
    phantom_type: FieldValue;
    dlp: FieldValue;
    size_specific_dose: FieldValue;
    ctdivol_alert_value: FieldValue;
    water_equivalent_diameter: FieldValue;
  };
}

export interface DoseReportJson {
  hospital: FieldValue;
  report_date: FieldValue;
  essential: {
    patient_id: FieldValue;
    study_id: FieldValue;
    accession_number: FieldValue;
    study_date: FieldValue;
    birth_date: FieldValue;
    sex: FieldValue;
  };
  device: {
    observer_name: FieldValue;
    manufacturer: FieldValue;
    model_name: FieldValue;
    serial_number: FieldValue;
    physical_location: FieldValue;
  };
  irradiation: {
    start_time: FieldValue;
    end_time: FieldValue;
    total_events: FieldValue;
    total_dlp: FieldValue;
  };
  acquisitions: AcquisitionJson[];
}

const orNull = (value: string | null | undefined): FieldValue => value ?? null;

/**
 * Converts between DoseReport and its snake_case JSON record.
 *
 * Reading back goes through class-validator: leaves must be strings or
 * null, missing leaves and groups become null.
 */
export class ReportJsonMapper {
  static toJson(report: DoseReport): DoseReportJson {
    const { essential, device, irradiation } = report;
    return {
      hospital: report.hospital,
      report_date: report.reportDate,
      essential: {
        patient_id: essential.patientId,
        study_id: essential.studyId,
        accession_number: essential.accessionNumber,
        study_date: essential.studyDate,
        birth_date: essential.birthDate,
        sex: essential.sex,
      },
      device: {
        observer_name: device.observerName,
        manufacturer: device.manufacturer,
        model_name: device.modelName,
        serial_number: device.serialNumber,
        physical_location: device.physicalLocation,
      },
      irradiation: {
        start_time: irradiation.startTime,
        end_time: irradiation.endTime,
        total_events: irradiation.totalEvents,
        total_dlp: irradiation.totalDlp,
      },
      acquisitions: report.acquisitions.map((acquisition) =>
        ReportJsonMapper.acquisitionToJson(acquisition),
      ),
    };
  }

  /**
   * @throws ReportInputError listing each violated property path
   */
  static fromJson(value: unknown): DoseReport {
    return ReportJsonMapper.fromValidatedDto(
      ReportJsonMapper.validate(value, ''),
    );
  }

  /**
   * Accepts an array of report records or a single record.
   */
  static fromJsonCollection(value: unknown): DoseReport[] {
    const items = Array.isArray(value) ? value : [value];
    const dtos = items.map((item, index) =>
      ReportJsonMapper.validate(item, Array.isArray(value) ? `${index}.` : ''),
    );
    return dtos.map((dto) => ReportJsonMapper.fromValidatedDto(dto));
  }

  private static validate(value: unknown, pathPrefix: string): DoseReportJsonDto {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) {
      throw new ReportInputError({
        message: 'Report record must be a JSON object',
        violations: [pathPrefix ? pathPrefix.slice(0, -1) : '<root>'],
      });
    }

    const dto = plainToInstance(DoseReportJsonDto, value);
    const errors = validateSync(dto);
    if (errors.length > 0) {
      throw new ReportInputError({
        message: 'Report record does not match the dose report shape',
        violations: flattenViolations(errors, pathPrefix),
      });
    }
    return dto;
  }

  private static fromValidatedDto(dto: DoseReportJsonDto): DoseReport {
    const essential = dto.essential ?? new EssentialJsonDto();
    const device = dto.device ?? new DeviceJsonDto();
    const irradiation = dto.irradiation ?? new IrradiationJsonDto();

    return deepFreeze({
      hospital: orNull(dto.hospital),
      reportDate: orNull(dto.report_date),
      essential: {
        patientId: orNull(essential.patient_id),
        studyId: orNull(essential.study_id),
        accessionNumber: orNull(essential.accession_number),
        studyDate: orNull(essential.study_date),
        birthDate: orNull(essential.birth_date),
        sex: orNull(essential.sex),
      },
      device: {
        observerName: orNull(device.observer_name),
        manufacturer: orNull(device.manufacturer),
        modelName: orNull(device.model_name),
        serialNumber: orNull(device.serial_number),
        physicalLocation: orNull(device.physical_location),
      },
      irradiation: {
        startTime: orNull(irradiation.start_time),
        endTime: orNull(irradiation.end_time),
        totalEvents: orNull(irradiation.total_events),
        totalDlp: orNull(irradiation.total_dlp),
      },
      acquisitions: (dto.acquisitions ?? []).map((acquisition) =>
        ReportJsonMapper.acquisitionFromDto(acquisition),
      ),
    });
  }

  private static acquisitionToJson(acquisition: Acquisition): AcquisitionJson {
    const { acquisitionParams, xraySourceParams, ctDose } = acquisition;
    return {
      protocol: acquisition.protocol,
      target_region: acquisition.targetRegion,
      acquisition_type: acquisition.acquisitionType,
      procedure_context: acquisition.procedureContext,
      irradiation_event_uid: acquisition.irradiationEventUid,
      comment: acquisition.comment,
      acquisition_params: {
        exposure_time: acquisitionParams.exposureTime,
        scanning_length: acquisitionParams.scanningLength,
        nominal_single_collimation: acquisitionParams.nominalSingleCollimation,
        nominal_total_collimation: acquisitionParams.nominalTotalCollimation,
        num_xray_sources: acquisitionParams.numXraySources,
        pitch_factor: acquisitionParams.pitchFactor,
      },
      xray_source_params: {
        identification: xraySourceParams.identification,
        kvp: xraySourceParams.kvp,
        max_tube_current: xraySourceParams.maxTubeCurrent,
        tube_current: xraySourceParams.tubeCurrent,
        exposure_time_per_rotation: xraySourceParams.exposureTimePerRotation,
      },
      ct_dose: {
        mean_ctdivol: ctDose.meanCtdivol,
        phantom_type: ctDose.phantomType,
        dlp: ctDose.dlp,
        size_specific_dose: ctDose.sizeSpecificDose,
        ctdivol_alert_value: ctDose.ctdivolAlertValue,
        water_equivalent_diameter: ctDose.waterEquivalentDiameter,
      },
    };
  }

  private static acquisitionFromDto(dto: AcquisitionJsonDto): Acquisition {
    const params = dto.acquisition_params ?? new AcquisitionParamsJsonDto();
    const source = dto.xray_source_params ?? new XraySourceParamsJsonDto();
    const dose = dto.ct_dose ?? new CtDoseJsonDto();

    return {
      protocol: orNull(dto.protocol),
      targetRegion: orNull(dto.target_region),
      acquisitionType: orNull(dto.acquisition_type),
      procedureContext: orNull(dto.procedure_context),
      irradiationEventUid: orNull(dto.irradiation_event_uid),
      comment: orNull(dto.comment),
      acquisitionParams: {
        exposureTime: orNull(params.exposure_time),
        scanningLength: orNull(params.scanning_length),
        nominalSingleCollimation: orNull(params.nominal_single_collimation),
        nominalTotalCollimation: orNull(params.nominal_total_collimation),
        numXraySources: orNull(params.num_xray_sources),
        pitchFactor: orNull(params.pitch_factor),
      },
      xraySourceParams: {
        identification: orNull(source.identification),
        kvp: orNull(source.kvp),
        maxTubeCurrent: orNull(source.max_tube_current),
        tubeCurrent: orNull(source.tube_current),
        exposureTimePerRotation: orNull(source.exposure_time_per_rotation),
      },
      ctDose: {
        meanCtdivol: orNull(dose.mean_ctdivol),
        phantomType: orNull(dose.phantom_type),
        dlp: orNull(dose.dlp),
        sizeSpecificDose: orNull(dose.size_specific_dose),
        ctdivolAlertValue: orNull(dose.ctdivol_alert_value),
        waterEquivalentDiameter: orNull(dose.water_equivalent_diameter),
      },
    };
  }
}

function flattenViolations(errors: ValidationError[], prefix: string): string[] {
  return errors.flatMap((error) => {
    const path = `${prefix}${error.property}`;
    const children = error.children ?? [];
    return children.length > 0
      ? flattenViolations(children, `${path}.`)
      : [path];
  });
}
