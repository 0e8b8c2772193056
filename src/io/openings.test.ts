/**
 * Opening Row Normalization Tests
 */

import {
  parseOpeningType,
  clearanceForType,
  normalizeOpeningRow,
  normalizeOpeningRows,
  groupOpeningsByWall
} from './openings';
import { OpeningType } from '../algorithm/types';
import { verticalConfig } from '../../test/fixtures/configs';

describe('parseOpeningType', () => {
  it('should map free-text type names', () => {
    expect(parseOpeningType('Single Flush Door')).toBe(OpeningType.Door);
    expect(parseOpeningType('Curtain Wall')).toBe(OpeningType.Storefront);
    expect(parseOpeningType('Storefront')).toBe(OpeningType.Storefront);
    expect(parseOpeningType('Fixed Window')).toBe(OpeningType.Window);
    expect(parseOpeningType('Louver')).toBe(OpeningType.Unknown);
    expect(parseOpeningType(undefined)).toBe(OpeningType.Unknown);
  });
});

describe('clearanceForType', () => {
  it('should give unknown openings window clearances', () => {
    expect(clearanceForType(OpeningType.Unknown, verticalConfig())).toEqual({ jambMin: 4, headerMin: 6, sillMin: 4 });
  });
});

describe('normalizeOpeningRow', () => {
  const config = verticalConfig();

  it('should convert export rows from feet', () => {
    const result = normalizeOpeningRow(
      {
        OpeningId: '9001.0',
        HostWallId: 1234,
        OpeningType: 'Door',
        'Width(ft)': 3,
        'Height(ft)': 7,
        'SillHeight(ft)': 0,
        'LeftEdgeAlongWall(ft)': 8.5
      },
      config
    );

    expect(result).toEqual({
      ok: true,
      hosted: {
        hostWallId: '1234',
        opening: {
          id: '9001',
          type: OpeningType.Door,
          x: 102,
          y: 0,
          w: 36,
          h: 84,
          clearance: { jambMin: 6, headerMin: 8, sillMin: 6 }
        }
      }
    });
  });

  it('should derive the left edge from the centre position', () => {
    const result = normalizeOpeningRow(
      { OpeningId: 'D2', OpeningType: 'Door', 'Width(ft)': 3, 'Height(ft)': 7, 'PositionAlongWall(ft)': 10 },
      config
    );

    expect(result).toMatchObject({ ok: true, hosted: { opening: { x: 102 } } });
  });

  it('should prefer inch fields over feet', () => {
    const result = normalizeOpeningRow(
      { id: 'D1', type: 'door', x: 50, 'LeftEdgeAlongWall(ft)': 1, w: 36, h: 84 },
      config
    );

    expect(result).toMatchObject({ ok: true, hosted: { opening: { x: 50, y: 0 } } });
  });

  it('should freeze the opening', () => {
    const result = normalizeOpeningRow({ id: 'D1', type: 'door', x: 50, w: 36, h: 84 }, config);

    expect(result.ok && Object.isFrozen(result.hosted.opening)).toBe(true);
  });

  it('should discard openings without area', () => {
    expect(normalizeOpeningRow({ id: 'D1', type: 'door', x: 50, w: 0, h: 84 }, config)).toEqual({
      ok: false,
      reason: 'opening D1 has non-positive size (0" x 84")'
    });
  });
});

describe('normalizeOpeningRows', () => {
  it('should keep the valid rows and report the rest', () => {
    const warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);

    const { openings, rejected } = normalizeOpeningRows(
      [
        { id: 'D1', hostWallId: 'W1', type: 'door', x: 50, w: 36, h: 84 },
        { id: 'D2', hostWallId: 'W1', type: 'door', x: 150, w: 36, h: -1 }
      ],
      verticalConfig()
    );

    expect(openings.map(o => o.opening.id)).toEqual(['D1']);
    expect(rejected.map(r => r.index)).toEqual([1]);
    warn.mockRestore();
  });
});

describe('groupOpeningsByWall', () => {
  it('should group by host wall and drop unhosted openings', () => {
    const { openings } = normalizeOpeningRows(
      [
        { id: 'D1', hostWallId: 'W1', type: 'door', x: 50, w: 36, h: 84 },
        { id: 'WN1', hostWallId: 'W2', type: 'window', x: 20, y: 30, w: 36, h: 48 },
        { id: 'D2', hostWallId: 'W1', type: 'door', x: 150, w: 36, h: 84 },
        { id: 'D3', type: 'door', x: 10, w: 36, h: 84 }
      ],
      verticalConfig()
    );

    const byWall = groupOpeningsByWall(openings);

    expect([...byWall.keys()]).toEqual(['W1', 'W2']);
    expect(byWall.get('W1')?.map(o => o.id)).toEqual(['D1', 'D2']);
    expect(byWall.get('W2')?.map(o => o.id)).toEqual(['WN1']);
  });
});
