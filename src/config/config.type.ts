import { DoseReportsConfig } from '../dose-reports/config/dose-reports-config.type';

export type AllConfigType = {
  doseReports: DoseReportsConfig;
};
