import { Type } from 'class-transformer';
import {
  IsArray,
  IsObject,
  IsOptional,
  IsString,
  ValidateNested,
} from 'class-validator';

// Shapes of exported report JSON, validated when reports are read back.
// Every leaf may be null or absent.

export class EssentialJsonDto {
  @IsOptional()
  @IsString()
  patient_id?: string | null;

  @IsOptional()
  @IsString()
  study_id?: string | null;

  @IsOptional()
  @IsString()
  accession_number?: string | null;

  @IsOptional()
  @IsString()
  study_date?: string | null;

  @IsOptional()
  @IsString()
  birth_date?: string | null;

  @IsOptional()
  @IsString()
  sex?: string | null;
}

export class DeviceJsonDto {
  @IsOptional()
  @IsString()
  observer_name?: string | null;

  @IsOptional()
  @IsString()
  manufacturer?: string | null;

  @IsOptional()
  @IsString()
  model_name?: string | null;

  @IsOptional()
  @IsString()
  serial_number?: string | null;

  @IsOptional()
  @IsString()
  physical_location?: string | null;
}

export class IrradiationJsonDto {
  @IsOptional()
  @IsString()
  start_time?: string | null;

  @IsOptional()
  @IsString()
  end_time?: string | null;

  @IsOptional()
  @IsString()
  total_events?: string | null;

  @IsOptional()
  @IsString()
  total_dlp?: string | null;
}

export class AcquisitionParamsJsonDto {
  @IsOptional()
  @IsString()
  exposure_time?: string | null;

  @IsOptional()
  @IsString()
  scanning_length?: string | null;

  @IsOptional()
  @IsString()
  nominal_single_collimation?: string | null;

  @IsOptional()
  @IsString()
  nominal_total_collimation?: string | null;

  @IsOptional()
  @IsString()
  num_xray_sources?: string | null;

  @IsOptional()
  @IsString()
  pitch_factor?: string | null;
}

export class XraySourceParamsJsonDto {
  @IsOptional()
  @IsString()
  identification?: string | null;

  @IsOptional()
  @IsString()
  kvp?: string | null;

  @IsOptional()
  @IsString()
  max_tube_current?: string | null;

  @IsOptional()
  @IsString()
  tube_current?: string | null;

  @IsOptional()
  @IsString()
  exposure_time_per_rotation?: string | null;
}

export class CtDoseJsonDto {
  @IsOptional()
  @IsString()
  mean_ctdivol?: string | null;

  @IsOptional()
  @IsString()
  phantom_type?: string | null;

  @IsOptional()
  @IsString()
  dlp?: string | null;

  @IsOptional()
  @IsString()
  size_specific_dose?: string | null;

  @IsOptional()
  @IsString()
  ctdivol_alert_value?: string | null;

  @IsOptional()
  @IsString()
  water_equivalent_diameter?: string | null;
}

export class AcquisitionJsonDto {
  @IsOptional()
  @IsString()
  protocol?: string | null;

  @IsOptional()
  @IsString()
  target_region?: string | null;

  @IsOptional()
  @IsString()
  acquisition_type?: string | null;

  @IsOptional()
  @IsString()
  procedure_context?: string | null;

  @IsOptional()
  @IsString()
  irradiation_event_uid?: string | null;

  @IsOptional()
  @IsString()
  comment?: string | null;

  @IsOptional()
  @IsObject()
  @ValidateNested()
  @Type(() => AcquisitionParamsJsonDto)
  acquisition_params?: AcquisitionParamsJsonDto | null;

  @IsOptional()
  @IsObject()
  @ValidateNested()
  @Type(() => XraySourceParamsJsonDto)
  xray_source_params?: XraySourceParamsJsonDto | null;

  @IsOptional()
  @IsObject()
  @ValidateNested()
  @Type(() => CtDoseJsonDto)
  ct_dose?: CtDoseJsonDto | null;
}

export class DoseReportJsonDto {
  @IsOptional()
  @IsString()
  hospital?: string | null;

  @IsOptional()
  @IsString()
  report_date?: string | null;

  @IsOptional()
  @IsObject()
  @ValidateNested()
  @Type(() => EssentialJsonDto)
  essential?: EssentialJsonDto | null;

  @IsOptional()
  @IsObject()
  @ValidateNested()
  @Type(() => DeviceJsonDto)
  device?: DeviceJsonDto | null;

  @IsOptional()
  @IsObject()
  @ValidateNested()
  @Type(() => IrradiationJsonDto)
  irradiation?: IrradiationJsonDto | null;

  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => AcquisitionJsonDto)
  acquisitions?: AcquisitionJsonDto[] | null;
}
