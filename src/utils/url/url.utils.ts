import type { QueryParams } from '@models/request.types';
import { isEmpty, isNil, pickBy } from 'lodash-es';

/** Drops unset and empty values so that optional filters never reach the query string. */
export const compactParams = (params: Partial<Record<string, string>>): QueryParams =>
  pickBy(params, (value): value is string => !isNil(value) && value !== '');

export const buildQueryString = (params?: QueryParams) =>
  isNil(params) || isEmpty(params) ? '' : `?${new URLSearchParams(params).toString()}`;

export const buildUrl = (baseUrl: string, path: string, params?: QueryParams) =>
  `${baseUrl.replace(/\/+$/, '')}${path}${buildQueryString(params)}`;
