import path from 'node:path';

import { describe, expect, it } from 'vitest';

import type { FigureCategoryConfig } from '../../src/config/campaign-config.js';
import { AmbiguousFigureError } from '../../src/core/errors.js';
import type { FieldValue, RecordSection } from '../../src/core/record.js';
import {
  expandFigurePattern,
  figureNameKey,
  normalizeFigureStem,
  selectFigureCandidate
} from '../../src/figures/figure-names.js';
import { FigureResolver } from '../../src/figures/resolve.js';
import { InMemoryFigureStore } from '../../src/testkit/memory-figure-store.js';

const MATCHING = { extensions: ['.png', '.jpg', '.jpeg', '.pdf'], suffixes: ['final'] };
const ROOT = path.resolve('/campaign');
const MAPS = path.join(ROOT, 'figures', 'maps');
const OVERLAYS = path.join(ROOT, 'figures', 'overlay');

const CATEGORIES: FigureCategoryConfig[] = [
  { category: 'Map', directory: 'figures/maps', pattern: '{identifier}_{category}.png', caption: '{identifier} {category}' },
  {
    category: 'Overlay',
    directory: 'figures/overlay',
    pattern: '{identifier}_Overlay.png',
    caption: 'Overlay for {identifier}',
    enabledField: 'Overlay'
  }
];

function section(identifier: string, overlay: FieldValue = 'yes'): RecordSection {
  const fields = new Map<string, FieldValue>([
    ['Id', identifier],
    ['Overlay', overlay]
  ]);
  return { kind: 'record', id: identifier, title: identifier, slug: identifier, record: { identifier, fields, sourceRow: 1 } };
}

describe('figure names', () => {
  it('expands pattern tokens', () => {
    expect(expandFigurePattern('{group}/{identifier}_{category}.png', { identifier: 'A', category: 'Map', group: 'Soil' })).toBe(
      'Soil/A_Map.png'
    );
    expect(expandFigurePattern('{identifier}{group}.png', { identifier: 'A', category: 'Map' })).toBe('A.png');
  });

  it('normalizes separators and strips configured suffixes at a boundary', () => {
    expect(normalizeFigureStem('  A - Map__final ', ['final'])).toBe('A_Map');
    expect(normalizeFigureStem('A_Map_FINAL_final', ['final'])).toBe('A_Map');
    expect(normalizeFigureStem('Semifinal', ['final'])).toBe('Semifinal');
  });

  it('ignores files with unaccepted extensions', () => {
    expect(figureNameKey('A_Map.txt', MATCHING)).toBeUndefined();
    expect(figureNameKey('A Map.PNG', MATCHING)).toEqual({ stem: 'A_Map', foldedStem: 'a_map', extension: '.png' });
  });

  it('prefers the exact name, then a single tolerant match', () => {
    expect(selectFigureCandidate('Map', 'A_Map.png', ['A_Map.png', 'a map.png'], MATCHING)).toBe('A_Map.png');
    expect(selectFigureCandidate('Map', 'A_Map.png', ['a-map_final.PNG', 'B_Map.png'], MATCHING)).toBe('a-map_final.PNG');
    expect(selectFigureCandidate('Map', 'A_Map.png', ['B_Map.png'], MATCHING)).toBeUndefined();
  });

  it('breaks ties by exact case, then by extension', () => {
    expect(selectFigureCandidate('Map', 'A_Map.png', ['a_map.png', 'A Map.jpg'], MATCHING)).toBe('A Map.jpg');
    expect(selectFigureCandidate('Map', 'A_Map.png', ['A Map.jpg', 'A-Map.png'], MATCHING)).toBe('A-Map.png');
  });

  it('throws when candidates stay tied', () => {
    expect(() => selectFigureCandidate('Map', 'A_Map.png', ['A_Map.jpg', 'A-Map.jpeg'], MATCHING)).toThrowError(
      new AmbiguousFigureError('Map', 'A_Map.png', ['A-Map.jpeg', 'A_Map.jpg'])
    );
  });
});

describe('figure resolver', () => {
  function createResolver(store: InMemoryFigureStore, placeholder?: string): FigureResolver {
    return new FigureResolver(store, {
      rootDir: ROOT,
      masterDir: path.join(ROOT, 'out'),
      categories: CATEGORIES,
      matching: MATCHING,
      placeholder
    });
  }

  it('resolves exact names relative to the master and honours the enable column', async () => {
    const store = new InMemoryFigureStore({ [MAPS]: ['A_Map.png'], [OVERLAYS]: ['A_Overlay.png'] });

    const resolution = await createResolver(store).resolve(section('A', 'No'));

    expect(resolution.diagnostics).toEqual([]);
    expect(resolution.references).toEqual([
      {
        category: 'Map',
        caption: 'A Map',
        slot: { status: 'resolved', path: '../figures/maps/A_Map.png', fileName: 'A_Map.png' }
      },
      { category: 'Overlay', caption: 'Overlay for A', slot: { status: 'disabled' } }
    ]);
  });

  it('uses a tolerant match and reports it', async () => {
    const store = new InMemoryFigureStore({ [MAPS]: ['b map.PNG'], [OVERLAYS]: ['B_Overlay.png'] });

    const resolution = await createResolver(store).resolve(section('B'));

    expect(resolution.references[0]?.slot).toEqual({
      status: 'resolved',
      path: '../figures/maps/b map.PNG',
      fileName: 'b map.PNG'
    });
    expect(resolution.diagnostics).toEqual([
      {
        code: 'FIGURE_NEAR_MATCH',
        severity: 'info',
        message: "Using 'b map.PNG' for expected 'Map' figure 'B_Map.png'.",
        sectionId: 'B',
        category: 'Map'
      }
    ]);
  });

  it('emits one warning per missing figure and references the placeholder', async () => {
    const store = new InMemoryFigureStore();

    const resolution = await createResolver(store, 'figures/missing.png').resolve(section('C'));

    expect(resolution.references.map((reference) => reference.slot)).toEqual([
      { status: 'placeholder', path: '../figures/missing.png', reason: 'missing' },
      { status: 'placeholder', path: '../figures/missing.png', reason: 'missing' }
    ]);
    expect(resolution.diagnostics.map((diagnostic) => diagnostic.message)).toEqual([
      `No 'Map' figure 'C_Map.png' in ${MAPS}.`,
      `No 'Overlay' figure 'C_Overlay.png' in ${OVERLAYS}.`
    ]);
    expect(resolution.diagnostics.every((diagnostic) => diagnostic.code === 'FIGURE_MISSING')).toBe(true);
  });

  it('omits unresolved figures without a placeholder', async () => {
    const store = new InMemoryFigureStore({ [MAPS]: ['D_Map.jpg', 'D-Map.jpeg'], [OVERLAYS]: ['D_Overlay.png'] });

    const resolution = await createResolver(store).resolve(section('D'));

    expect(resolution.references[0]?.slot).toEqual({ status: 'omitted', reason: 'ambiguous' });
    expect(resolution.diagnostics).toEqual([
      {
        code: 'FIGURE_AMBIGUOUS',
        severity: 'warning',
        message: "Ambiguous 'Map' figure for 'D_Map.png': D-Map.jpeg, D_Map.jpg",
        sectionId: 'D',
        category: 'Map'
      }
    ]);
  });

  it('falls back to the placeholder for files LaTeX cannot include by path', async () => {
    const store = new InMemoryFigureStore({ [MAPS]: ['G#1_Map.png'], [OVERLAYS]: ['G#1_Overlay.png'] });

    const resolution = await createResolver(store, 'figures/missing.png').resolve(section('G#1'));

    expect(resolution.references.map((reference) => reference.slot)).toEqual([
      { status: 'placeholder', path: '../figures/missing.png', reason: 'unusable' },
      { status: 'placeholder', path: '../figures/missing.png', reason: 'unusable' }
    ]);
    expect(resolution.diagnostics[0]).toEqual({
      code: 'FIGURE_UNUSABLE_NAME',
      severity: 'warning',
      message: "'Map' figure path '../figures/maps/G#1_Map.png' contains %, #, braces or a backslash and cannot be included.",
      sectionId: 'G#1',
      category: 'Map'
    });
    expect(resolution.diagnostics).toHaveLength(2);
  });

  it('collects every group-scope image whose name contains the group label', async () => {
    const plots = path.join(ROOT, 'figures', 'plots');
    const store = new InMemoryFigureStore({
      [plots]: ['Water_flow.png', 'Soil_moisture.png', 'notes_Soil.txt', 'Soil#2.png', 'Soil_depth.jpg', 'soil_ph.png']
    });
    const resolver = new FigureResolver(store, {
      rootDir: ROOT,
      masterDir: path.join(ROOT, 'out'),
      categories: [
        ...CATEGORIES,
        { category: 'Plots', directory: 'figures/plots', pattern: '{group}', caption: '{group} plot {file}', scope: 'group' }
      ],
      matching: MATCHING
    });

    const resolution = await resolver.resolveGroup('Soil');

    expect(resolution.references).toEqual([
      {
        category: 'Plots',
        caption: 'Soil plot Soil_depth.jpg',
        slot: { status: 'resolved', path: '../figures/plots/Soil_depth.jpg', fileName: 'Soil_depth.jpg' }
      },
      {
        category: 'Plots',
        caption: 'Soil plot Soil_moisture.png',
        slot: { status: 'resolved', path: '../figures/plots/Soil_moisture.png', fileName: 'Soil_moisture.png' }
      }
    ]);
    expect(resolution.diagnostics.map((diagnostic) => diagnostic.code)).toEqual(['FIGURE_UNUSABLE_NAME']);
    expect(store.listCalls).toEqual([plots]);
  });

  it('lists each directory once per resolver', async () => {
    const store = new InMemoryFigureStore({ [OVERLAYS]: ['E_Overlay.png', 'F_Overlay.png'] });
    const resolver = createResolver(store);

    await resolver.resolve(section('E'));
    await resolver.resolve(section('F'));

    expect(store.listCalls).toEqual([MAPS]);
  });
});
