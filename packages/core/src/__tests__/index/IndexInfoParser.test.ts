/**
 * IndexInfoParser Tests
 */

import { contextToBase64 } from '../../context/ContextCodec';
import { Ctx } from '../../context/ContextPath';
import { parseIndexInfo, parseIndexInfoEntry } from '../../index/IndexInfoParser';

const AGE_ENTRY =
  'ns=test:indexname=person_age_idx:set=person:bin=age:type=numeric:indextype=default:context=NULL:state=RW';

describe('IndexInfoParser', () => {
  describe('parseIndexInfoEntry', () => {
    it('should parse a plain bin index', () => {
      expect(parseIndexInfoEntry(AGE_ENTRY)).toEqual({
        name: 'person_age_idx',
        namespace: 'test',
        set: 'person',
        bin: 'age',
        indexType: 'NUMERIC',
        collectionType: 'DEFAULT',
      });
    });

    it('should map a NULL set to the empty set name', () => {
      const parsed = parseIndexInfoEntry('ns=test:indexname=idx:set=NULL:bin=age:type=numeric:indextype=none');

      expect(parsed.set).toBe('');
      expect(parsed.collectionType).toBe('DEFAULT');
    });

    it('should accept the bins key and collection index types', () => {
      const parsed = parseIndexInfoEntry(
        'ns=test:indexname=tags_idx:set=person:bins=tags:type=string:indextype=list:state=RW'
      );

      expect(parsed.bin).toBe('tags');
      expect(parsed.indexType).toBe('STRING');
      expect(parsed.collectionType).toBe('LIST');
    });

    it('should keep the base64 context including its padding', () => {
      const context = contextToBase64([Ctx.mapKey('address'), Ctx.mapKey('city')]);
      const parsed = parseIndexInfoEntry(
        `ns=test:indexname=city_idx:set=person:bin=address:type=string:indextype=default:context=${context}`
      );

      expect(parsed.context).toBe(context);
    });

    it('should map geo and map collection types', () => {
      const parsed = parseIndexInfoEntry('ns=test:indexname=loc:set=places:bin=loc:type=geo2dsphere:indextype=mapkeys');

      expect(parsed.indexType).toBe('GEO2DSPHERE');
      expect(parsed.collectionType).toBe('MAPKEYS');
    });

    it('should reject entries without a name', () => {
      expect(() => parseIndexInfoEntry('ns=test:set=person:bin=age:type=numeric')).toThrow(
        "Malformed index info entry: 'ns=test:set=person:bin=age:type=numeric'"
      );
    });

    it('should reject unknown value types', () => {
      expect(() => parseIndexInfoEntry('ns=test:indexname=idx:bin=age:type=decimal')).toThrow(
        "Unknown index type 'decimal' in index info entry 'ns=test:indexname=idx:bin=age:type=decimal'"
      );
    });
  });

  describe('parseIndexInfo', () => {
    it('should parse every entry of a response', () => {
      const response = `${AGE_ENTRY};ns=test:indexname=person_name_idx:set=person:bin=name:type=string:indextype=default;`;

      expect(parseIndexInfo(response).map((m) => m.name)).toEqual(['person_age_idx', 'person_name_idx']);
    });

    it('should return no indexes for an empty response', () => {
      expect(parseIndexInfo('')).toEqual([]);
      expect(parseIndexInfo(' ;\n')).toEqual([]);
    });
  });
});
