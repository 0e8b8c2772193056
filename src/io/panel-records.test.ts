/**
 * Panel Record Export Tests
 */

import { toPanelRecords, toPanelRecordsForWalls } from './panel-records';
import { processWall } from '../algorithm/wall-processor';
import { verticalConfig } from '../../test/fixtures/configs';
import { STANDARD_WALL, door } from '../../test/fixtures/walls';

describe('toPanelRecords', () => {
  it('should flatten panels with their cutouts', () => {
    const config = verticalConfig();
    const records = toPanelRecords(processWall(STANDARD_WALL, [door(config)], config));

    expect(records).toHaveLength(3);
    expect(records[1]).toEqual({
      panelName: 'P02',
      panelType: '48x108',
      wallId: 'W1',
      xIn: 94.125,
      yIn: 0,
      widthIn: 48,
      heightIn: 108,
      areaIn2: 5184,
      cutoutsJson: '[{"id":"D1","type":"Door","x":0,"y":0,"w":47.875,"h":92}]'
    });
    expect(records[0].cutoutsJson).toBe('[]');
  });
});

describe('toPanelRecordsForWalls', () => {
  it('should keep wall order', () => {
    const config = verticalConfig();
    const layouts = [
      processWall(STANDARD_WALL, [], config),
      processWall({ id: 'W2', widthIn: 100, heightIn: 100 }, [], config)
    ];

    expect(toPanelRecordsForWalls(layouts).map(r => `${r.wallId}/${r.panelName}`)).toEqual([
      'W1/P01',
      'W1/P02',
      'W2/P01'
    ]);
  });
});
