import {
  AcquisitionParams,
  CtDose,
  DeviceInfo,
  EssentialIdentifiers,
  IrradiationSummary,
  ReportHeader,
  XraySourceParams,
} from '../entities/dose-report.entity';
import { deepFreeze } from '../../utils/deep-freeze';

/**
 * Ordered alternatives per field. The first pattern whose first capture group
 * is non-empty wins, so the most specific pattern goes first.
 */
export type PatternTable<F extends string> = Readonly<
  Record<F, readonly RegExp[]>
>;

export type AcquisitionFieldName =
  | 'protocol'
  | 'targetRegion'
  | 'acquisitionType'
  | 'procedureContext'
  | 'irradiationEventUid'
  | 'comment';

export const ACQUISITION_MARKER_POLICY_NAMES = [
  'numbered-section',
  'section-title',
  'protocol-line',
] as const;

export type AcquisitionMarkerPolicyName =
  (typeof ACQUISITION_MARKER_POLICY_NAMES)[number];

export const DEFAULT_ACQUISITION_MARKER_POLICIES: readonly AcquisitionMarkerPolicyName[] =
  ['numbered-section', 'section-title'];

export interface CtDosePatternLibrary {
  readonly header: PatternTable<keyof ReportHeader>;
  readonly essential: PatternTable<keyof EssentialIdentifiers>;
  readonly device: PatternTable<keyof DeviceInfo>;
  readonly irradiation: PatternTable<keyof IrradiationSummary>;
  readonly acquisition: PatternTable<AcquisitionFieldName>;
  readonly acquisitionParams: PatternTable<keyof AcquisitionParams>;
  readonly xraySource: PatternTable<keyof XraySourceParams>;
  readonly ctDose: PatternTable<keyof CtDose>;
  readonly acquisitionMarkers: Readonly<
    Record<AcquisitionMarkerPolicyName, RegExp>
  >;
}

export const CT_DOSE_PATTERN_LIBRARY_TOKEN = 'CtDosePatternLibrary';

// Label followed by ":" then a value captured as a whole
function labelled(label: string, value: string, flags = 'i'): RegExp {
  return new RegExp(`${label}[ \\t]*:[ \\t]*(${value})`, flags);
}

// Label followed by "=" then number + unit captured as one string
function measured(label: string, unit: string): RegExp {
  return new RegExp(`${label}\\s*=[ \\t]*([\\d.]+\\s*${unit})`, 'i');
}

const REST_OF_LINE = '[^\\n]*[^\\s]';
const TIME_OF_DAY = '(?:,?[ \\t]+\\d{1,2}:\\d{2}(?::\\d{2})?(?:\\s*[AP]M)?)?';

const DATE_SHAPES = [
  `[A-Za-z]{3,9}\\.?\\s+\\d{1,2},?\\s+\\d{4}${TIME_OF_DAY}`,
  `\\d{1,2}[ -][A-Za-z]{3,9}\\.?[ -]\\d{4}${TIME_OF_DAY}`,
  `\\d{4}[-/]\\d{1,2}[-/]\\d{1,2}${TIME_OF_DAY}`,
  `\\d{1,2}[./]\\d{1,2}[./]\\d{4}${TIME_OF_DAY}`,
  `\\d{8}(?!\\d)`,
];

// Anything up to the next "Token:" on the same line, for dates in no known shape
const DATE_FALLBACK = '[^\\n]*?[^\\s](?=[ \\t]+[^\\s:]+:|[ \\t]*(?:\\n|$))';

function dateField(labels: readonly string[]): RegExp[] {
  return [
    ...labels.flatMap((label) =>
      DATE_SHAPES.map((shape) => labelled(label, shape)),
    ),
    ...labels.map((label) => labelled(label, DATE_FALLBACK)),
  ];
}

function textField(labels: readonly string[]): RegExp[] {
  return labels.map((label) => labelled(label, REST_OF_LINE));
}

/**
 * Builds the immutable pattern tables.
 *
 * Throws when a pattern carries the g or y flag: matching must not depend on
 * lastIndex state left behind by a previous document.
 */
export function buildPatternLibrary(): CtDosePatternLibrary {
  const library: CtDosePatternLibrary = {
    header: {
      hospital: [
        /^By\s+([^\n]*?Hospital[^\n]*?)\s+on\s+CT\b/im,
        /^([^\n]*?Hospital[^\n]*?)\s+on\s+CT\b/im,
      ],
      reportDate: [/Hospital[^\n]*?\bon\s+CT,[ \t]*([^\n]*[^\s])/im],
    },
    essential: {
      patientId: [
        /Patient\s*ID\s*:[ \t]*(\d+)/i,
        /Patient\s*(?:No\.?|Number)\s*:[ \t]*(\d+)/i,
        /Patient\s*ID\s*:[ \t]*([A-Za-z0-9][\w-]*\d[\w-]*)/i,
        /(?<!(?:Study|Event|UID|Accession)\s*)\bID\s*:[ \t]*(\d+)/i,
      ],
      studyId: [
        /Study\s*ID\s*:[ \t]*(\d+)/i,
        /Study\s*ID\s*:[ \t]*([A-Za-z0-9][\w.-]*)/i,
      ],
      accessionNumber: [
        /Accession\s*Number\s*:[ \t]*(\d+)/i,
        /Accession\s*(?:No\.?|#)\s*:[ \t]*(\d+)/i,
        /Accession\s*Number\s*:[ \t]*([A-Za-z0-9][\w-]*)/i,
      ],
      studyDate: dateField(['Study\\s*Date', 'Exam\\s*Date']),
      birthDate: dateField([
        "Patient['’]?s\\s*Birth\\s*Date",
        'Birth\\s*Date',
        'Date\\s*of\\s*Birth',
        'DOB',
      ]),
      sex: [
        /Patient['’]?s\s*Sex\s*:[ \t]*(\w+)/i,
        /\bSex\s*:[ \t]*(\w+)/i,
        /\bGender\s*:[ \t]*(\w+)/i,
      ],
    },
    device: {
      observerName: textField([
        'Device\\s+Observer\\s+Name',
        'Station\\s+Name',
      ]),
      manufacturer: textField([
        'Device\\s+Observer\\s+Manufacturer',
        '\\bManufacturer',
      ]),
      modelName: textField([
        'Device\\s+Observer\\s+Model\\s+Name',
        '\\bModel\\s+Name',
      ]),
      serialNumber: textField([
        'Device\\s+Observer\\s+Serial\\s+Number',
        'Device\\s+Serial\\s+Number',
      ]),
      physicalLocation: textField([
        'Device\\s+Observer\\s+Physical\\s+Location\\s+during\\s+observation',
        'Device\\s+Observer\\s+Physical\\s+Location',
      ]),
    },
    irradiation: {
      startTime: textField(['Start\\s+of\\s+X-Ray\\s+Irradiation']),
      endTime: textField(['End\\s+of\\s+X-Ray\\s+Irradiation']),
      totalEvents: [
        measured('Total\\s+Number\\s+of\\s+Irradiation\\s+Events', 'events'),
      ],
      totalDlp: [
        measured('CT\\s+Dose\\s+Length\\s+Product\\s+Total', 'mGy\\.cm'),
        measured('CT\\s+Dose\\s+Length\\s+Product\\s+Total', 'mGy\\s?cm'),
      ],
    },
    acquisition: {
      protocol: textField(['Acquisition\\s+Protocol']),
      targetRegion: textField(['Target\\s+Region']),
      acquisitionType: textField(['CT\\s+Acquisition\\s+Type']),
      procedureContext: textField(['Procedure\\s+Context']),
      irradiationEventUid: [
        labelled('Irradiation\\s+Event\\s+UID', '[0-9][0-9.]*[0-9]'),
        ...textField(['Irradiation\\s+Event\\s+UID']),
      ],
      comment: textField(['\\bComment']),
    },
    acquisitionParams: {
      exposureTime: [measured('Exposure\\s+Time', 's\\b')],
      scanningLength: [measured('Scanning\\s+Length', 'mm')],
      nominalSingleCollimation: [
        measured('Nominal\\s+Single\\s+Collimation\\s+Width', 'mm'),
      ],
      nominalTotalCollimation: [
        measured('Nominal\\s+Total\\s+Collimation\\s+Width', 'mm'),
      ],
      numXraySources: [
        measured('Number\\s+of\\s+X-Ray\\s+Sources', 'X-Ray\\s+sources'),
      ],
      pitchFactor: [measured('Pitch\\s+Factor', 'ratio')],
    },
    xraySource: {
      identification: textField([
        'Identification\\s+of\\s+the\\s+X-Ray\\s+Source',
      ]),
      kvp: [measured('KVP', 'kV')],
      maxTubeCurrent: [measured('Maximum\\s+X-Ray\\s+Tube\\s+Current', 'mA')],
      tubeCurrent: [measured('(?<!Maximum\\s)X-Ray\\s+Tube\\s+Current', 'mA')],
      exposureTimePerRotation: [
        measured('Exposure\\s+Time\\s+per\\s+Rotation', 's\\b'),
      ],
    },
    ctDose: {
      meanCtdivol: [measured('Mean\\s+CTDIvol', 'mGy')],
      phantomType: textField(['CTDIw\\s+Phantom\\s+Type']),
      dlp: [
        measured('(?<!Total\\s)\\bDLP', 'mGy\\.cm'),
        measured('(?<!Total\\s)\\bDLP', 'mGy\\s?cm'),
      ],
      sizeSpecificDose: [
        measured('Size\\s+Specific\\s+Dose\\s+Estimation', 'mGy'),
        measured('\\bSSDE', 'mGy'),
      ],
      ctdivolAlertValue: [measured('CTDIvol\\s+Alert\\s+Value', 'mGy')],
      waterEquivalentDiameter: [
        measured('Water\\s+Equivalent\\s+Diameter', 'mm'),
      ],
    },
    acquisitionMarkers: {
      'numbered-section': /\b\d+\.\d+\s+CT\s+Acquisition\b(?!\s+Type)/i,
      'section-title': /^CT\s+Acquisition[ \t]*$/im,
      'protocol-line': /^Acquisition\s+Protocol\s*:/im,
    },
  };

  assertStatelessPatterns(library);
  return deepFreeze(library);
}

export function assertStatelessPatterns(library: CtDosePatternLibrary): void {
  const groups: ReadonlyArray<Readonly<Record<string, readonly RegExp[]>>> = [
    library.header,
    library.essential,
    library.device,
    library.irradiation,
    library.acquisition,
    library.acquisitionParams,
    library.xraySource,
    library.ctDose,
  ];
  const patterns = [
    ...groups.flatMap((group) => Object.values(group).flat()),
    ...Object.values(library.acquisitionMarkers),
  ];
  for (const pattern of patterns) {
    if (pattern.global || pattern.sticky) {
      throw new Error(
        `Pattern ${pattern.source} must not use the g or y flag`,
      );
    }
  }
}

export const CT_DOSE_PATTERN_LIBRARY: CtDosePatternLibrary =
  buildPatternLibrary();
