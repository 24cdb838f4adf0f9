import { describe, it, expect } from 'vitest';
import { DEFAULT_STRUCTURED_QUERY, parseStructuredQuery } from '../structured-query';

describe('parseStructuredQuery', () => {
  it('accepts each operation', () => {
    expect(parseStructuredQuery({ operation: 'get_rankings', metric: 'sales', period: '2024-12', topK: 3 })).toEqual({
      operation: 'get_rankings',
      metric: 'sales',
      period: '2024-12',
      topK: 3,
    });
    expect(
      parseStructuredQuery({ operation: 'detect_anomaly', region: 'Jongno', domain: 'population', period: '2024-01' }),
    ).toMatchObject({ operation: 'detect_anomaly', domain: 'population' });
  });

  it('keeps nulls for unmentioned arguments and drops unknown keys', () => {
    expect(
      parseStructuredQuery({ operation: 'compare_domains', region: 'Jongno', periodFrom: null, view: 'v_trend' }),
    ).toEqual({ operation: 'compare_domains', region: 'Jongno', periodFrom: null });
  });

  it('rejects unknown operations and malformed arguments', () => {
    expect(parseStructuredQuery({ operation: 'drop_table' })).toBeNull();
    expect(parseStructuredQuery({ operation: 'detect_anomaly', region: 'A', domain: 'weather', period: '2024' })).toBeNull();
    expect(parseStructuredQuery('compare_domains')).toBeNull();
    expect(parseStructuredQuery(null)).toBeNull();
  });

  it('holds arguments to the bounds the operations enforce', () => {
    const rankings = { operation: 'get_rankings', metric: 'sales', period: '2024-12' };
    expect(parseStructuredQuery({ ...rankings, topK: 500 })).toBeNull();
    expect(parseStructuredQuery({ ...rankings, topK: 0 })).toBeNull();
    expect(parseStructuredQuery({ ...rankings, metric: 'weather' })).toBeNull();
    expect(parseStructuredQuery({ ...rankings, metric: 'constructor' })).toBeNull();
    expect(parseStructuredQuery({ ...rankings, period: 'last month' })).toBeNull();
    expect(parseStructuredQuery({ ...rankings, level: 'galaxy' })).toBeNull();
    expect(
      parseStructuredQuery({ operation: 'detect_anomaly', region: 'A', domain: 'sales', period: '2024', zThreshold: 0 }),
    ).toBeNull();
    expect(parseStructuredQuery({ operation: 'compare_domains', periodFrom: '2024-13' })).toBeNull();
  });

  it('keeps level and metric aliases as written', () => {
    expect(
      parseStructuredQuery({ operation: 'get_rankings', metric: 'Foot_Traffic', period: '2024-12', level: 'sig' }),
    ).toEqual({ operation: 'get_rankings', metric: 'Foot_Traffic', period: '2024-12', level: 'sig' });
  });

  it('has a default comparison over both domains', () => {
    expect(DEFAULT_STRUCTURED_QUERY).toEqual({ operation: 'compare_domains', domains: ['population', 'sales'] });
  });
});
