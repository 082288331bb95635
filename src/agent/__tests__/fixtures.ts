import { EntityCatalog, parseCatalog } from '../../compendium/index.js';
import { SpatialIndex, type Location, type Region } from '../../maps/index.js';

export const ELDIN: Region = { name: 'Eldin', layer: 'surface', xMin: 2000, xMax: 4000, yMin: -1000, yMax: 1000 };

const place = (name: string, category: string, x: number, z: number, layer: Location['layer'] = 'surface'): Location => ({
  name,
  category,
  layer,
  coords: { x, z },
  icon: category,
});

export const ELDIN_LYNEL = place('Lynel (Eldin)', 'lynel', 3000, 0);
export const HEBRA_LYNEL = place('Lynel (Hebra)', 'lynel', -3000, -3000);
export const LOOKOUT_LANDING = place('Lookout Landing', 'landmark', 0, 500);
export const SKY_SHRINE = place('Ukouh Shrine', 'shrine', 0, 0, 'sky');
export const JOCHI_SHRINE = place('Jochi-ihiga Shrine', 'shrine', 100, 100);
export const MAYACHIN_SHRINE = place('Mayachin Shrine', 'shrine', -200, 300);
export const KOROK_SEEDS = [place('Korok 1', 'korok_seed', 10, 10), place('Korok 2', 'korok_seed', 20, 20)];

export function testSpatialIndex(): SpatialIndex {
  return new SpatialIndex(
    [ELDIN_LYNEL, HEBRA_LYNEL, LOOKOUT_LANDING, SKY_SHRINE, JOCHI_SHRINE, MAYACHIN_SHRINE, ...KOROK_SEEDS],
    [ELDIN]
  );
}

export function testCatalog(): EntityCatalog {
  return new EntityCatalog(
    parseCatalog({
      creatures: [
        { name: 'Lynel', category: 'monster', description: 'King of beasts.' },
        { name: 'Bokoblin', category: 'monster', description: 'A common enemy.' },
      ],
    })
  );
}
