/**
 * @file Parameter Addressing Types
 *
 * @module params
 */

import type { ParamRecord } from './ParamRecord.js';

/**
 * Two-level name of one parameter.
 *
 * @property section - Group the parameter belongs to (e.g. 'Basic Types')
 * @property key - Name within the section (e.g. 'Bool Param')
 */
export interface ParamAddress {
    section: string;
    key: string;
}

/**
 * One registry row, as yielded by ordered iteration.
 */
export interface ParamEntry extends ParamAddress {
    record: ParamRecord;
}
