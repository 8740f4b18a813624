export type FusionErrorCode = 'WORKBOOK_FORMAT' | 'EMPTY_ROSTER' | 'CONFIG';

export class FusionError extends Error {
  readonly code: FusionErrorCode;

  constructor(code: FusionErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class WorkbookFormatError extends FusionError {
  constructor(message: string) {
    super('WORKBOOK_FORMAT', message);
  }
}

export class EmptyRosterError extends FusionError {
  readonly sheetName: string;

  constructor(sheetName: string) {
    super('EMPTY_ROSTER', `Roster sheet '${sheetName}' contains no student names`);
    this.sheetName = sheetName;
  }
}

export class ConfigError extends FusionError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('CONFIG', `Invalid configuration: ${issues.join('; ')}`);
    this.issues = issues;
  }
}
