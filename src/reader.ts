/**
 * etcreader — EasyTau container reader
 *
 * parseEtc() decodes a whole container with the ContainerFile schema and maps
 * the decoded records into presentation objects. readEtcFile() does the same
 * for a file on disk.
 *
 *   const file = await readEtcFile('sample.etc');
 *   for (const curve of file.dataCurves) plot(curve.x, curve.y);
 */

import { readFile } from 'node:fs/promises';

import { getBytes, getInteger, getNumber, getRecords } from './access';
import {
  ContainerFormatError,
  bytesToGuid,
  oleDaysToDate,
  parameterData,
  safeDecodeString,
  stripNul,
  type ParameterData,
} from './convert';
import { decode } from './decode';
import { CONTAINER_IDENT, CONTAINER_IDENT_SIZE, ContainerFile } from './layout';
import type { DecodedRecord } from './types';

// ─── Public types ─────────────────────────────────────────────────────────────

export interface SystemParameter {
  readonly identity:    string;
  readonly displayName: string;
  readonly unit:        string;
  readonly prefix:      string;
  readonly precision:   number;
  readonly data:        ParameterData;
}

export interface SeriesParameter {
  readonly identity:    string;
  readonly displayName: string;
  readonly unit:        string;
  readonly prefix:      string;
  readonly precision:   number;
  readonly start:       number;
  readonly step:        number;
  readonly end:         number;
}

export interface MeasurementParameter {
  readonly identity:    string;
  readonly displayName: string;
  readonly unit:        string;
  readonly prefix:      string;
  readonly precision:   number;
  readonly data:        ParameterData;
}

export interface DataCurve {
  /** Raw tag; see curveType(). */
  readonly curveTypeValue:        number;
  /** Raw tag; see anisotropy(). */
  readonly anisotropyValue:       number;
  readonly measurementParameters: readonly MeasurementParameter[];
  readonly resolution:            number;
  readonly firstX:                number;
  readonly x:                     readonly number[];
  readonly y:                     readonly number[];
}

export interface EtcFile {
  readonly identity:                string;
  readonly version:                 number;
  readonly guid:                    string;
  readonly creationDate:            Date;
  /** Raw tag; see measurementContext(). */
  readonly measurementContextValue: number;
  readonly systemParameters:        readonly SystemParameter[];
  readonly seriesParameters:        readonly SeriesParameter[];
  readonly dataCurves:              readonly DataCurve[];
}

// ─── Identity ─────────────────────────────────────────────────────────────────

function expectedIdent(): Uint8Array {
  const ident = new Uint8Array(CONTAINER_IDENT_SIZE);
  for (let i = 0; i < CONTAINER_IDENT.length; i++) ident[i] = CONTAINER_IDENT.charCodeAt(i);
  return ident;
}

const EXPECTED_IDENT = expectedIdent();

function checkIdent(ident: Uint8Array | null): Uint8Array {
  if (
    ident === null
    || ident.length !== EXPECTED_IDENT.length
    || !ident.every((byte, i) => byte === EXPECTED_IDENT[i])
  ) {
    throw new ContainerFormatError(
      `Not an EasyTau container: identity is '${safeDecodeString(ident === null ? null : stripNul(ident))}'.`,
    );
  }
  return ident;
}

// ─── Record mapping ───────────────────────────────────────────────────────────

function text(record: DecodedRecord, key: string): string {
  return safeDecodeString(getBytes(record, key));
}

function toSystemParameter(r: DecodedRecord): SystemParameter {
  return {
    identity:    text(r, 'SysParIdent'),
    displayName: text(r, 'SysParDispNm'),
    unit:        text(r, 'SysParUnit'),
    prefix:      text(r, 'SysParPrefix'),
    precision:   getInteger(r, 'Precision'),
    data:        parameterData(getInteger(r, 'ParType'), getInteger(r, 'Size'), getBytes(r, 'Data')),
  };
}

function toSeriesParameter(r: DecodedRecord): SeriesParameter {
  return {
    identity:    text(r, 'SeriesParIdent'),
    displayName: text(r, 'SeriesParDispNm'),
    unit:        text(r, 'SeriesParUnit'),
    prefix:      text(r, 'SeriesParPrefix'),
    precision:   getInteger(r, 'Precision'),
    start:       getNumber(r, 'Start'),
    step:        getNumber(r, 'Step'),
    end:         getNumber(r, 'End'),
  };
}

function toMeasurementParameter(r: DecodedRecord): MeasurementParameter {
  return {
    identity:    text(r, 'MeasParIdent'),
    displayName: text(r, 'SeriesParDispNm'),
    unit:        text(r, 'SeriesParUnit'),
    prefix:      text(r, 'SeriesParPrefix'),
    precision:   getInteger(r, 'Precision'),
    data:        parameterData(getInteger(r, 'ParType'), getInteger(r, 'Size'), getBytes(r, 'Data')),
  };
}

function toDataCurve(r: DecodedRecord): DataCurve {
  const points = getRecords(r, 'XY');
  return {
    curveTypeValue:        getInteger(r, 'CurveType'),
    anisotropyValue:       getInteger(r, 'Anisotropy'),
    measurementParameters: getRecords(r, 'MeasParam').map(toMeasurementParameter),
    resolution:            getNumber(r, 'Resolution'),
    firstX:                getNumber(r, 'FirstX'),
    x:                     points.map(p => getNumber(p, 'X')),
    y:                     points.map(p => getInteger(p, 'Y')),
  };
}

// ─── Entry points ─────────────────────────────────────────────────────────────

/**
 * Decode a complete EasyTau container.
 *
 * Throws ContainerFormatError when the identity string is wrong or a tagged
 * parameter cannot be interpreted, and the decoder's errors for truncated or
 * malformed input.
 */
export function parseEtc(bytes: Uint8Array | ArrayBuffer): EtcFile {
  const content = decode(ContainerFile, bytes);
  const ident   = checkIdent(getBytes(content, 'Ident'));

  return {
    identity:                safeDecodeString(stripNul(ident)),
    version:                 getInteger(content, 'Version'),
    guid:                    bytesToGuid(guidBytes(content)),
    creationDate:            oleDaysToDate(getNumber(content, 'CreationDate')),
    measurementContextValue: getInteger(content, 'MeasContext'),
    systemParameters:        getRecords(content, 'SysParam').map(toSystemParameter),
    seriesParameters:        getRecords(content, 'SeriesParam').map(toSeriesParameter),
    dataCurves:              getRecords(content, 'Curve').map(toDataCurve),
  };
}

function guidBytes(content: DecodedRecord): Uint8Array {
  const guid = getBytes(content, 'GUID');
  if (guid === null) throw new ContainerFormatError('Container has no GUID.');
  return guid;
}

/** Read and decode an EasyTau container from disk. */
export async function readEtcFile(path: string): Promise<EtcFile> {
  const bytes = await readFile(path);
  return parseEtc(bytes);
}
