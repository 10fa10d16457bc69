import { readFileSync } from 'node:fs';
import { join } from 'node:path';

export const CT_DOSE_FIXTURES_DIR = join(__dirname, '..', 'fixtures', 'ct-dose-reports');

export type CtDoseFixtureName =
  | 'two-acquisitions'
  | 'no-acquisitions'
  | 'reflowed-columns';

export function readCtDoseFixture(name: CtDoseFixtureName): string {
  return readFileSync(join(CT_DOSE_FIXTURES_DIR, `${name}.txt`), 'utf-8');
}
