import { compactJson } from '../../utils/json.utils';

describe('compactJson', () => {
  it('drops null and undefined fields at every depth', () => {
    const result = compactJson({
      id: 'T1',
      targetTableName: null,
      query: undefined,
      columns: [{ id: 'C1', length: null, nullable: false }],
    });

    expect(result).toEqual({ id: 'T1', columns: [{ id: 'C1', nullable: false }] });
    expect(result).not.toHaveProperty('targetTableName');
  });

  it('keeps falsy values that are present', () => {
    expect(compactJson({ count: 0, flag: false, name: '' })).toEqual({ count: 0, flag: false, name: '' });
  });

  it('drops null array elements', () => {
    expect(compactJson(['a', null, 'b'])).toEqual(['a', 'b']);
  });

  it('returns undefined for an absent root', () => {
    expect(compactJson(null)).toBeUndefined();
  });
});
