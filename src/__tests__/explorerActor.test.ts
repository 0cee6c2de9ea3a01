import { describe, it, expect } from 'vitest';
import {
  createExplorerActor,
  createExplorerState,
  type ExplorerActor,
  type ExplorerGateway,
} from '../explorerActor';
import type { PlanetActor } from '../planetActor';
import {
  askExplorer,
  askPlanet,
  rejectPlanetEnvelope,
  type PlanetEnvelope,
} from '../actorMessages';
import { createMailbox } from '../mailbox';
import { DEFAULT_SETTINGS, explorerDefinitionSchema } from '../simulationConfig';
import type { ExplorerDefinitionInput } from '../simulationConfig';
import { reject } from '../simErrors';
import { createTestExplorerDefinition, startTestPlanet } from './testHelpers';

/** A galaxy of one planet with no edges. */
function soloGateway(planet: PlanetActor): ExplorerGateway {
  return {
    neighbors: (id) => (id === planet.id ? [] : undefined),
    travel: () => reject('Disconnected', 'no edges'),
    rocketJump: () => reject('Disconnected', 'no edges'),
    ask(_planetId, type, request) {
      return askPlanet(planet.mailbox, type, request);
    },
  };
}

/** Sits in front of a planet and turns every combination request away. */
function refuseCombining(planet: PlanetActor) {
  const mailbox = createMailbox<PlanetEnvelope>(4);
  const forwarding = (async () => {
    for (;;) {
      const envelope = await mailbox.receive();
      if (envelope === undefined) return;
      if (envelope.type === 'request_combine') {
        rejectPlanetEnvelope(envelope, 'CapabilityExceeded', 'combining is switched off');
      } else {
        await planet.mailbox.send(envelope);
      }
    }
  })();
  return { mailbox, forwarding };
}

function createTestExplorer(
  planet: PlanetActor,
  overrides: Partial<ExplorerDefinitionInput> = {},
  gateway: ExplorerGateway = soloGateway(planet)
): { actor: ExplorerActor; running: Promise<void> } {
  const definition = explorerDefinitionSchema.parse(
    createTestExplorerDefinition(overrides)
  );
  const actor = createExplorerActor(
    createExplorerState(definition, DEFAULT_SETTINGS),
    DEFAULT_SETTINGS,
    gateway,
    4
  );
  return { actor, running: actor.run() };
}

describe('Explorer Actor', () => {
  it('answers query_state with its view', async () => {
    const planet = startTestPlanet();
    const { actor } = createTestExplorer(planet.actor, { name: 'Vega' });

    expect(await askExplorer(actor.mailbox, 'query_state', {})).toEqual({
      success: true,
      view: {
        id: 1,
        name: 'Vega',
        position: 1,
        inventory: {},
        life: 40,
        strategy: 'best_path',
        target: 'water',
        produced: 0,
        alive: true,
      },
    });
    await askExplorer(actor.mailbox, 'stop', {});
    await planet.stop();
  });

  it('combines carried inputs and keeps gathering after producing its target', async () => {
    const planet = startTestPlanet({ type: 'B', resources: ['hydrogen'] });
    const { actor } = createTestExplorer(planet.actor, {
      inventory: { hydrogen: 1, oxygen: 1 },
    });

    const reply = await askExplorer(actor.mailbox, 'tick', { tick: 1 });
    expect(reply.success && reply.report.events).toEqual([
      { type: 'combine', product: 'water', planetId: 1 },
      { type: 'target_produced', target: 'water', count: 1 },
      { type: 'generate', kind: 'hydrogen', planetId: 1 },
    ]);

    const state = await askExplorer(actor.mailbox, 'query_state', {});
    expect(state.success && state.view.inventory).toEqual({ hydrogen: 1, water: 1 });
    await askExplorer(actor.mailbox, 'stop', {});
    await planet.stop();
  });

  it('refuses ticks once killed', async () => {
    const planet = startTestPlanet();
    const { actor } = createTestExplorer(planet.actor);

    expect(await askExplorer(actor.mailbox, 'kill', { cause: 'killed' })).toEqual({
      success: true,
    });
    expect(await askExplorer(actor.mailbox, 'tick', { tick: 1 })).toMatchObject({
      success: false,
      error: 'ExplorerDead',
    });
    const state = await askExplorer(actor.mailbox, 'query_state', {});
    expect(state.success && state.view.deathCause).toBe('killed');
    await askExplorer(actor.mailbox, 'stop', {});
    await planet.stop();
  });

  it('dies when the planet under it is destroyed', async () => {
    const planet = startTestPlanet();
    const { actor } = createTestExplorer(planet.actor);

    expect(
      await askExplorer(actor.mailbox, 'planet_destroyed', { planetId: 2 })
    ).toEqual({ success: true, died: false });
    expect(
      await askExplorer(actor.mailbox, 'planet_destroyed', { planetId: 1 })
    ).toEqual({ success: true, died: true });
    await askExplorer(actor.mailbox, 'stop', {});
    await planet.stop();
  });

  it('answers requests queued behind stop with ExplorerDead', async () => {
    const planet = startTestPlanet();
    const { actor, running } = createTestExplorer(planet.actor);

    const stopped = askExplorer(actor.mailbox, 'stop', {});
    const late = askExplorer(actor.mailbox, 'query_state', {});
    await running;

    expect(await stopped).toEqual({ success: true });
    expect(await late).toMatchObject({ success: false, error: 'ExplorerDead' });
    await planet.stop();
  });

  it('falls back to a simpler target after repeated capability rejections', async () => {
    const planet = startTestPlanet({ type: 'C', resources: [] });
    const refusing = refuseCombining(planet.actor);
    const gateway: ExplorerGateway = {
      ...soloGateway(planet.actor),
      ask(_planetId, type, request) {
        return askPlanet(refusing.mailbox, type, request);
      },
    };
    const { actor } = createTestExplorer(
      planet.actor,
      {
        strategy: 'best_path_adaptive',
        target: 'life',
        inventory: { hydrogen: 1, oxygen: 1, carbon: 1 },
      },
      gateway
    );
    const refusal = {
      type: 'rejected',
      reason: 'CapabilityExceeded',
      message: 'combining is switched off',
      planetId: 1,
    };

    for (const tick of [1, 2]) {
      const reply = await askExplorer(actor.mailbox, 'tick', { tick });
      expect(reply.success && reply.report.events).toEqual([refusal]);
    }
    const third = await askExplorer(actor.mailbox, 'tick', { tick: 3 });
    expect(third.success && third.report.events).toEqual([
      refusal,
      { type: 'target_switched', from: 'life', to: 'water', reason: 'CapabilityExceeded' },
    ]);

    const state = await askExplorer(actor.mailbox, 'query_state', {});
    expect(state.success && state.view).toMatchObject({
      target: 'water',
      produced: 0,
      inventory: { hydrogen: 1, oxygen: 1, carbon: 1 },
    });
    await askExplorer(actor.mailbox, 'stop', {});
    refusing.mailbox.close();
    await refusing.forwarding;
    await planet.stop();
  });

  it('keeps its charge when a rocket jump target is refused', async () => {
    const chain: Record<number, number[]> = { 1: [2], 2: [1, 3], 3: [2, 4], 4: [3] };
    const planet = startTestPlanet({ type: 'C', resources: [] });
    const gateway: ExplorerGateway = {
      ...soloGateway(planet.actor),
      neighbors: (id) => chain[id],
      travel: () => ({ success: true }),
      rocketJump: (_from, to) => reject('PlanetUnavailable', `planet ${to} is gone`),
    };
    const { actor } = createTestExplorer(
      planet.actor,
      { target: 'diamond', knowledge: 'full' },
      gateway
    );
    await askExplorer(actor.mailbox, 'galaxy_map', {
      adjacency: chain,
      planets: [
        { id: 1, type: 'C', supportedResources: [] },
        { id: 2, type: 'D', supportedResources: [] },
        { id: 3, type: 'D', supportedResources: [] },
        { id: 4, type: 'D', supportedResources: ['carbon'] },
      ],
    });

    const reply = await askExplorer(actor.mailbox, 'tick', { tick: 1 });
    expect(reply.success && reply.report.events).toEqual([
      {
        type: 'rejected',
        reason: 'PlanetUnavailable',
        message: 'planet 4 is gone',
        planetId: 4,
      },
      { type: 'travel', from: 1, to: 2, viaRocket: false },
    ]);

    const view = await askPlanet(planet.actor.mailbox, 'query_state', {});
    expect(view.success && view.view).toMatchObject({ energy: 1, rockets: 0 });
    await askExplorer(actor.mailbox, 'stop', {});
    await planet.stop();
  });
});
