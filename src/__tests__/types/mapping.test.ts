import { decodeHubMapping, decodeLinkMapping, decodeMapping, decodeSatelliteMapping } from '../../types/mapping';
import { MappingDecodeError } from '../../utils/errors';
import { hubRecord, linkRecord, satelliteRecord } from '../helpers/fixtures';

describe('mapping model', () => {
  it('dispatches on the mapping type tag', () => {
    const mapping = decodeMapping(hubRecord('M1', 'A', 'H1', 'C1'));

    expect(mapping.mappingType).toBe('Hub');
    expect(decodeHubMapping(hubRecord('M1', 'A', 'H1', 'C1')).businessKeyMapping).toEqual({
      businessKeyId: 'bk_M1',
      columnId: 'C1',
    });
  });

  it('rejects unknown tags', () => {
    expect(() => decodeMapping({ id: 'R1', mappingType: 'ReferenceTable' })).toThrow(
      new MappingDecodeError("Unknown mapping type 'ReferenceTable'"),
    );
  });

  it('reports the missing fields of a malformed record', () => {
    const { hubId: _hubId, ...withoutHub } = hubRecord('M1', 'A', 'H1', 'C1');

    expect(() => decodeMapping(withoutHub)).toThrow('Invalid Hub mapping: hubId: Required');
  });

  it('reads link column mappings under their wire names', () => {
    const link = decodeLinkMapping(
      linkRecord('M2', 'B', 'L1', {
        dependentChildColumnMappings: [{ linkColumnId: 'DC1', tableColumnId: 'C2' }],
        dataColumnMappings: [{ dataColumnId: 'D1', stagingTableColumnId: 'C3' }],
      }),
    );

    expect(link.dependentChildColumnMappings).toEqual([{ dependentChildId: 'DC1', stagingTableColumnId: 'C2' }]);
    expect(link.dataColumnMappings).toEqual([{ dataColumnId: 'D1', stagingTableColumnId: 'C3' }]);
    expect(link.hubReferenceColumnMappings).toEqual([]);
  });

  describe('satellite parent', () => {
    it('accepts a hub parent', () => {
      expect(decodeSatelliteMapping(satelliteRecord('S1', 'C', 'M1', { hubId: 'H1' })).hubId).toBe('H1');
    });

    it('accepts a link parent', () => {
      expect(decodeSatelliteMapping(satelliteRecord('S1', 'C', 'M2', { linkId: 'L1' })).linkId).toBe('L1');
    });

    it('accepts a record naming both parents', () => {
      const satellite = decodeSatelliteMapping(satelliteRecord('S1', 'C', 'M1', { hubId: 'H1', linkId: 'L1' }));

      expect([satellite.hubId, satellite.linkId]).toEqual(['H1', 'L1']);
    });

    it('rejects a record naming no parent', () => {
      expect(() => decodeSatelliteMapping(satelliteRecord('S1', 'C', 'M1', {}))).toThrow(
        'Invalid Satellite mapping: SatelliteMapping must have either hubId or linkId',
      );
    });
  });
});
