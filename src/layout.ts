/**
 * etcreader — EasyTau container layout
 *
 * Field layout of an EasyTau (.etc) measurement container. Every record is
 * little-endian; strings are [length: i32][bytes] pairs; repeated sections are
 * [count: i32][records].
 *
 *   ContainerFile
 *     Ident[32] Version GUID[16] CreationDate MeasContext
 *     SysParamCount    SysParam[]
 *     SeriesParamCount SeriesParam[]
 *     CurveCount       Curve[]  →  MeasParam[]  XY[]
 *
 * Field names are the ones the file format uses. MeasParam reuses the
 * SeriesPar* names for its display name, unit and prefix.
 */

import { defineRecord, listOf, sized } from './schema';
import type { ByteOrderProfile } from './types';

export const CONTAINER_PROFILE: ByteOrderProfile = 'little_endian';

/** The Ident field, NUL-padded to 32 bytes. */
export const CONTAINER_IDENT      = 'EasyTau Container';
export const CONTAINER_IDENT_SIZE = 32;
export const GUID_SIZE            = 16;

const options = { profile: CONTAINER_PROFILE };

export const SysParam = defineRecord('SysParam', {
  SysParIdLgt:     'i32',
  SysParIdent:     sized('char_array', 'SysParIdLgt'),
  SysParDispNmLgt: 'i32',
  SysParDispNm:    sized('char_array', 'SysParDispNmLgt'),
  SysParUnitLgt:   'i32',
  SysParUnit:      sized('char_array', 'SysParUnitLgt'),
  SysParPrefixLgt: 'i32',
  SysParPrefix:    sized('char_array', 'SysParPrefixLgt'),
  Precision:       'i32',
  ParType:         'i32',
  Size:            'i32',
  Data:            sized('char_array', 'Size'),
}, options);

export const SeriesParam = defineRecord('SeriesParam', {
  SeriesParIdLgt:     'i32',
  SeriesParIdent:     sized('char_array', 'SeriesParIdLgt'),
  SeriesParDispNmLgt: 'i32',
  SeriesParDispNm:    sized('char_array', 'SeriesParDispNmLgt'),
  SeriesParUnitLgt:   'i32',
  SeriesParUnit:      sized('char_array', 'SeriesParUnitLgt'),
  SeriesParPrefixLgt: 'i32',
  SeriesParPrefix:    sized('char_array', 'SeriesParPrefixLgt'),
  Precision:          'i32',
  Start:              'f32',
  Step:               'f32',
  End:                'f32',
}, options);

export const MeasParam = defineRecord('MeasParam', {
  MeasParIdLgt:       'i32',
  MeasParIdent:       sized('char_array', 'MeasParIdLgt'),
  SeriesParDispNmLgt: 'i32',
  SeriesParDispNm:    sized('char_array', 'SeriesParDispNmLgt'),
  SeriesParUnitLgt:   'i32',
  SeriesParUnit:      sized('char_array', 'SeriesParUnitLgt'),
  SeriesParPrefixLgt: 'i32',
  SeriesParPrefix:    sized('char_array', 'SeriesParPrefixLgt'),
  Precision:          'i32',
  ParType:            'i32',
  Size:               'i32',
  Data:               sized('char_array', 'Size'),
}, options);

export const XY = defineRecord('XY', {
  X: 'f32',
  Y: 'i32',
}, options);

export const DataCurve = defineRecord('DataCurve', {
  CurveType:      'i32',
  Anisotropy:     'i32',
  Resolution:     'f32',
  FirstX:         'f32',
  MeasParamCount: 'i32',
  MeasParam:      listOf(MeasParam, 'MeasParamCount'),
  NumPoints:      'i32',
  XY:             listOf(XY, 'NumPoints'),
}, options);

export const ContainerFile = defineRecord('ContainerFile', {
  Ident:            sized('char_array', CONTAINER_IDENT_SIZE),
  Version:          'i32',
  GUID:             sized('char_array', GUID_SIZE),
  CreationDate:     'f64',
  MeasContext:      'i32',
  SysParamCount:    'i32',
  SysParam:         listOf(SysParam, 'SysParamCount'),
  SeriesParamCount: 'i32',
  SeriesParam:      listOf(SeriesParam, 'SeriesParamCount'),
  CurveCount:       'i32',
  Curve:            listOf(DataCurve, 'CurveCount'),
}, options);
