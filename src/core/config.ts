/**
 * Runtime settings read from the environment.
 * CLI flags and request parameters override these per call.
 */

export const SIC_CODES_URL = process.env.SIC_CODES_URL || 'https://www.sec.gov/info/edgar/siccodes.htm';
export const USER_AGENT = process.env.SEC_USER_AGENT || 'filing-ratios contact@filing-ratios.dev';
export const DATA_DIR = process.env.EDGAR_DATA_DIR || 'data/edgar';
export const WEB_PORT = parseInt(process.env.PORT || '3005', 10);

/** Reporting currency unit facts must be denominated in */
export const REPORTING_UNIT = 'USD';

export const DEFAULT_YEAR = 2019;
export const DEFAULT_QUARTER = 'Q2';

export const SUBMISSIONS_FILE = 'sub.txt';
export const FACTS_FILE = 'num.txt';
