import { describe, it, expect } from 'vitest';
import { createOrchestrator, type Orchestrator } from '../orchestrator';
import type { GalaxySnapshot, Inventory } from '../models';
import type { SimEvent } from '../simEvents';
import { SimulationStateError, StructuralInvariantError } from '../simErrors';
import { countOf } from '../resourceTypes';
import { QUIET_SETTINGS, createTestExplorerDefinition } from './testHelpers';

function explorerIn(snapshot: GalaxySnapshot, id: number) {
  const found = snapshot.explorers.find((e) => e.id === id);
  if (!found || found.status !== 'known') {
    throw new Error(`Explorer ${id} missing from snapshot`);
  }
  return found;
}

function planetIn(snapshot: GalaxySnapshot, id: number) {
  const found = snapshot.planets.find((p) => p.id === id);
  if (!found || found.status !== 'known') {
    throw new Error(`Planet ${id} missing from snapshot`);
  }
  return found;
}

function recordEvents(orchestrator: Orchestrator): SimEvent[] {
  const seen: SimEvent[] = [];
  orchestrator.events.on('planet_destroyed', (e) => seen.push(e));
  orchestrator.events.on('explorer_died', (e) => seen.push(e));
  orchestrator.events.on('target_switched', (e) => seen.push(e));
  orchestrator.events.on('target_produced', (e) => seen.push(e));
  orchestrator.events.on('asteroid_deflected', (e) => seen.push(e));
  return seen;
}

/**
 * 4 - 1 - 2 - 3
 *
 * Planet 1 (C) offers carbon and unlimited combining, 4 offers hydrogen and
 * oxygen, 3 is the only silicon source. 2 is a single-charge relay whose
 * loss cuts 3 off.
 */
function splitGalaxy(strategy: 'best_path' | 'best_path_adaptive') {
  return createOrchestrator(
    {
      planets: [
        { id: 1, type: 'C', resources: ['carbon'] },
        { id: 2, type: 'D', resources: [], energy: 1 },
        { id: 3, type: 'D', resources: ['silicon'] },
        { id: 4, type: 'D', resources: ['hydrogen', 'oxygen'] },
      ],
      connections: [
        [4, 1],
        [1, 2],
        [2, 3],
      ],
      explorers: [
        createTestExplorerDefinition({
          strategy,
          target: 'ai_partner',
          knowledge: 'full',
        }),
      ],
    },
    QUIET_SETTINGS
  );
}

describe('Orchestrator', () => {
  // ── Lifecycle ─────────────────────────────────────────────────

  describe('lifecycle', () => {
    function tiny(): Orchestrator {
      return createOrchestrator(
        { planets: [{ id: 1, type: 'D', resources: [] }] },
        QUIET_SETTINGS
      );
    }

    it('refuses to tick before start', async () => {
      const sim = tiny();
      await expect(sim.tick()).rejects.toThrow(SimulationStateError);
      await expect(sim.run(1)).rejects.toThrow(SimulationStateError);
      expect(() => sim.pause()).toThrow(SimulationStateError);
      expect(sim.getPhase()).toBe('waiting_start');
    });

    it('refuses a second start', async () => {
      const sim = tiny();
      await sim.start();
      await expect(sim.start()).rejects.toThrow(SimulationStateError);
      await sim.shutdown();
    });

    it('refuses to tick after shutdown and reports actors as unknown', async () => {
      const sim = tiny();
      await sim.start();
      await sim.shutdown();
      await sim.shutdown();

      expect(sim.getPhase()).toBe('stopped');
      await expect(sim.tick()).rejects.toThrow(SimulationStateError);
      const snapshot = await sim.snapshot();
      expect(snapshot.planets).toEqual([{ id: 1, status: 'unknown' }]);
    });

    it('counts ticks and logs them', async () => {
      const sim = tiny();
      await sim.start();
      const summaries = await sim.run(3);

      expect(summaries.map((s) => s.tick)).toEqual([1, 2, 3]);
      expect(sim.getTick()).toBe(3);
      expect(sim.getLog().filter((e) => e.type === 'tick_completed')).toHaveLength(3);
      await sim.shutdown();
    });

    it('stops ticking while paused', async () => {
      const sim = tiny();
      await sim.start();
      sim.pause();
      await expect(sim.tick()).rejects.toThrow(SimulationStateError);
      expect(await sim.run(5)).toEqual([]);
      sim.resume();
      expect((await sim.tick()).tick).toBe(1);
      await sim.shutdown();
    });
  });

  describe('galaxy validation', () => {
    it('rejects duplicate planet ids', () => {
      expect(() =>
        createOrchestrator({
          planets: [
            { id: 1, type: 'A' },
            { id: 1, type: 'B' },
          ],
        })
      ).toThrow(StructuralInvariantError);
    });

    it('rejects an edge to an unknown planet', () => {
      expect(() =>
        createOrchestrator({ planets: [{ id: 1, type: 'A' }], connections: [[1, 5]] })
      ).toThrow(StructuralInvariantError);
    });

    it('rejects an explorer starting nowhere', () => {
      expect(() =>
        createOrchestrator({
          planets: [{ id: 1, type: 'A' }],
          explorers: [createTestExplorerDefinition({ start: 9 })],
        })
      ).toThrow('Explorer 1 starts on unknown planet 9');
    });

    it('rejects a planet outside its type capabilities', () => {
      expect(() =>
        createOrchestrator({
          planets: [{ id: 1, type: 'C', resources: ['carbon', 'silicon'] }],
        })
      ).toThrow(StructuralInvariantError);
    });
  });

  // ── Environment ───────────────────────────────────────────────

  describe('event sequence', () => {
    it('plays S, A and pauses on $', async () => {
      const sim = createOrchestrator(
        { planets: [{ id: 1, type: 'A', resources: ['hydrogen'], energy: 1 }] },
        { ...QUIET_SETTINGS, eventSequence: 'SA$' }
      );
      const seen = recordEvents(sim);
      await sim.start();

      expect((await sim.tick()).paused).toBe(false);
      expect(planetIn(await sim.snapshot(), 1)).toMatchObject({ energy: 1, rockets: 1 });

      await sim.tick();
      expect(seen).toEqual([{ type: 'asteroid_deflected', tick: 2, planetId: 1 }]);

      const third = await sim.tick();
      expect(third.paused).toBe(true);
      expect(sim.getPhase()).toBe('paused');
      await expect(sim.tick()).rejects.toThrow(SimulationStateError);

      expect(planetIn(await sim.snapshot(), 1)).toEqual({
        status: 'known',
        id: 1,
        type: 'A',
        inventory: {},
        energy: 1,
        rockets: 0,
        alive: true,
      });
      expect(sim.getLog().map((e) => e.type)).toContain('rocket_built');

      sim.resume();
      expect((await sim.run(2)).map((s) => s.tick)).toEqual([4, 5]);
      await sim.shutdown();
    });

    it('validates environment patches', () => {
      const sim = createOrchestrator({ planets: [{ id: 1, type: 'A' }] });
      expect(() => sim.configureEnvironment({ sunrayRate: 2 })).toThrow();
      expect(() => sim.configureEnvironment({ asteroidRate: 0.2 })).not.toThrow();
    });

    it('kills an explorer standing on a destroyed planet', async () => {
      const sim = createOrchestrator(
        {
          planets: [
            { id: 1, type: 'D', resources: [], energy: 1 },
            { id: 2, type: 'D', resources: [] },
          ],
          connections: [[1, 2]],
          explorers: [createTestExplorerDefinition()],
        },
        QUIET_SETTINGS
      );
      const seen = recordEvents(sim);
      await sim.start();

      const results = await sim.sendAsteroid([1]);
      expect(results).toEqual([
        {
          planetId: 1,
          outcome: { success: true, deflected: false, destroyed: true, energy: 0 },
        },
      ]);
      expect(seen).toEqual([
        { type: 'planet_destroyed', tick: 0, planetId: 1, wasCritical: false, connected: true },
        { type: 'explorer_died', tick: 0, explorerId: 1, cause: 'planet_destroyed' },
      ]);

      const summary = await sim.tick();
      expect(summary.reports).toEqual([]);
      const snapshot = await sim.snapshot();
      expect(explorerIn(snapshot, 1).alive).toBe(false);
      expect(planetIn(snapshot, 1).alive).toBe(false);
      await sim.shutdown();
    });
  });

  // ── Explorer Scenarios ────────────────────────────────────────

  describe('explorer scenarios', () => {
    it('builds life on a C planet from carried base resources', async () => {
      const sim = createOrchestrator(
        {
          planets: [{ id: 1, type: 'C', resources: [] }],
          explorers: [
            createTestExplorerDefinition({
              target: 'life',
              inventory: { hydrogen: 1, oxygen: 1, carbon: 1 },
            }),
          ],
        },
        QUIET_SETTINGS
      );
      const seen = recordEvents(sim);
      await sim.start();
      await sim.tick();

      expect(explorerIn(await sim.snapshot(), 1)).toMatchObject({
        inventory: { life: 1 },
        produced: 1,
        alive: true,
      });
      expect(seen).toEqual([
        { type: 'target_produced', tick: 1, explorerId: 1, target: 'life', count: 1 },
      ]);
      await sim.shutdown();
    });

    it('lets only one of several explorers combine on a B planet', async () => {
      const sim = createOrchestrator(
        {
          planets: [{ id: 1, type: 'B', resources: ['hydrogen', 'oxygen'] }],
          explorers: [1, 2, 3].map((id) => createTestExplorerDefinition({ id })),
        },
        QUIET_SETTINGS
      );
      await sim.start();
      await sim.tick();

      const snapshot = await sim.snapshot();
      const water = [1, 2, 3]
        .map((id): Inventory => explorerIn(snapshot, id).inventory)
        .reduce((sum, inv) => sum + countOf(inv, 'water'), 0);
      expect(water).toBe(1);
      await sim.shutdown();
    });

    it('jumps by rocket along a long route, then crafts a diamond', async () => {
      const sim = createOrchestrator(
        {
          planets: [
            { id: 1, type: 'A', resources: ['hydrogen'] },
            { id: 2, type: 'D', resources: [] },
            { id: 3, type: 'C', resources: [] },
            { id: 4, type: 'D', resources: ['carbon'] },
          ],
          connections: [
            [1, 2],
            [2, 3],
            [3, 4],
          ],
          explorers: [
            createTestExplorerDefinition({ target: 'diamond', knowledge: 'full' }),
          ],
        },
        { ...QUIET_SETTINGS, rocketJumpMinHops: 2 }
      );
      await sim.start();

      const first = await sim.tick();
      expect(first.reports[0].events).toEqual([
        { type: 'travel', from: 1, to: 4, viaRocket: true },
      ]);
      expect(planetIn(await sim.snapshot(), 1)).toMatchObject({ energy: 4, rockets: 0 });

      await sim.run(2);
      expect(explorerIn(await sim.snapshot(), 1)).toMatchObject({
        position: 4,
        inventory: { diamond: 1 },
        produced: 1,
        life: 37,
      });
      await sim.shutdown();
    });

    it('runs a greedy explorer until its life is spent, draining the pools it uses', async () => {
      const sim = createOrchestrator(
        {
          planets: [
            { id: 1, type: 'D', resources: ['hydrogen'] },
            { id: 2, type: 'D', resources: ['oxygen'] },
            { id: 3, type: 'C', resources: [] },
          ],
          connections: [
            [1, 2],
            [2, 3],
          ],
          explorers: [
            createTestExplorerDefinition({ strategy: 'greedy', life: 2 }),
          ],
        },
        QUIET_SETTINGS
      );
      await sim.start();
      const summaries = await sim.run(2);

      const lastEvents = summaries[1].reports[0].events;
      expect(lastEvents[lastEvents.length - 1]).toEqual({
        type: 'died',
        cause: 'exhausted',
      });
      expect(summaries.map((s) => s.destroyedPlanets)).toEqual([[1], [2]]);
      const snapshot = await sim.snapshot();
      expect(explorerIn(snapshot, 1)).toMatchObject({
        alive: false,
        life: 0,
        position: 3,
        inventory: { hydrogen: 5, oxygen: 5 },
      });
      expect(planetIn(snapshot, 1)).toMatchObject({ alive: false, energy: 0 });
      expect(planetIn(snapshot, 2)).toMatchObject({ alive: false, energy: 0 });
      expect(sim.criticalNodes()).toEqual([]);
      expect(
        sim
          .getLog()
          .slice(-4)
          .map((e) => e.message)
      ).toEqual([
        'Explorer 1 died (exhausted)',
        'Planet 2 ran out of energy',
        'Galaxy remains connected; critical nodes: []',
        'Tick 2: 1 planets, 0 explorers alive',
      ]);
      await sim.shutdown();
    });

    it('switches an adaptive explorer to a fallback after a critical planet falls', async () => {
      const sim = splitGalaxy('best_path_adaptive');
      const seen = recordEvents(sim);
      await sim.start();
      expect(sim.criticalNodes()).toEqual([1, 2]);

      await sim.sendAsteroid([2]);
      expect(sim.criticalNodes()).toEqual([]);
      expect(sim.isConnected()).toBe(false);

      const summary = await sim.tick();
      expect(summary.reports[0].events.map((e) => e.type)).toEqual([
        'rejected',
        'target_switched',
        'generate',
        'travel',
      ]);
      expect(seen).toContainEqual({
        type: 'target_switched',
        tick: 1,
        explorerId: 1,
        from: 'ai_partner',
        to: 'dolphin',
        reason: 'Disconnected',
      });
      expect(explorerIn(await sim.snapshot(), 1)).toMatchObject({
        target: 'dolphin',
        alive: true,
        position: 4,
        inventory: { carbon: 1 },
      });
      await sim.shutdown();
    });

    it('strands a non-adaptive explorer in the same situation', async () => {
      const sim = splitGalaxy('best_path');
      await sim.start();
      await sim.sendAsteroid([2]);

      const summary = await sim.tick();
      expect(summary.reports[0].events).toEqual([
        {
          type: 'rejected',
          reason: 'Disconnected',
          message: 'no reachable source of silicon for ai_partner',
          planetId: undefined,
        },
        { type: 'died', cause: 'stranded' },
      ]);
      expect(explorerIn(await sim.snapshot(), 1).alive).toBe(false);
      await sim.shutdown();
    });

    it('strands an explorer whose only source has no charge left', async () => {
      const sim = createOrchestrator(
        {
          planets: [
            { id: 1, type: 'B', resources: ['hydrogen'], energy: 0 },
            { id: 2, type: 'D', resources: ['oxygen'], energy: 0 },
          ],
          connections: [[1, 2]],
          explorers: [
            createTestExplorerDefinition({
              strategy: 'best_path_adaptive',
              knowledge: 'full',
            }),
          ],
        },
        QUIET_SETTINGS
      );
      await sim.start();

      const summary = await sim.tick();
      expect(summary.reports[0].events).toEqual([
        {
          type: 'rejected',
          reason: 'Disconnected',
          message: 'no reachable source of hydrogen for water',
          planetId: undefined,
        },
        { type: 'died', cause: 'stranded' },
      ]);
      expect(explorerIn(await sim.snapshot(), 1)).toMatchObject({
        alive: false,
        life: 40,
        position: 1,
      });
      await sim.shutdown();
    });
  });

  // ── Control Surface ───────────────────────────────────────────

  describe('explorer control', () => {
    function single(): Orchestrator {
      return createOrchestrator(
        {
          planets: [{ id: 1, type: 'D', resources: [] }],
          explorers: [createTestExplorerDefinition()],
        },
        QUIET_SETTINGS
      );
    }

    it('reconfigures strategy and target', async () => {
      const sim = single();
      await sim.start();
      expect(await sim.configure(1, { strategy: 'greedy', target: 'diamond' })).toEqual({
        success: true,
      });

      expect(explorerIn(await sim.snapshot(), 1)).toMatchObject({
        strategy: 'greedy',
        target: 'diamond',
      });
      expect(sim.getLog().at(-1)?.message).toBe(
        'Explorer 1 reconfigured: strategy greedy, target diamond'
      );
      await sim.shutdown();
    });

    it('kills an explorer once', async () => {
      const sim = single();
      await sim.start();
      expect(await sim.killExplorer(1)).toEqual({ success: true });
      expect(await sim.killExplorer(1)).toMatchObject({
        success: false,
        error: 'ExplorerDead',
      });
      expect(explorerIn(await sim.snapshot(), 1).alive).toBe(false);
      expect(await sim.configure(1, { target: 'life' })).toMatchObject({
        success: false,
        error: 'ExplorerDead',
      });
      await sim.shutdown();
    });

    it('resets explorer memory', async () => {
      const sim = single();
      await sim.start();
      expect(await sim.resetExplorer(1)).toEqual({ success: true });
      expect(sim.getLog().at(-1)?.message).toBe('Explorer 1 memory reset');
      await sim.shutdown();
    });

    it('throws for an unknown explorer', async () => {
      const sim = single();
      await sim.start();
      await expect(sim.configure(9, {})).rejects.toThrow('Explorer not found: 9');
      await sim.shutdown();
    });
  });
});
