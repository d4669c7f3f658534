import Fastify from 'fastify';
import { ZodError } from 'zod';
import type { Logger } from '../core/logger.js';
import type { RandomSource } from '../core/prng.js';
import type { ZooState } from '../core/types.js';
import type { FailureKind, Outcome } from '../core/outcome.js';
import {
  AmountSchema, AnimalRefSchema, BreedSchema, BuildEnclosureSchema, BuyAnimalSchema, ConfigSchema,
  FireEmployeeSchema, HireEmployeeSchema, RenameAnimalSchema, UpgradeEnclosureSchema
} from '../core/schema.js';
import { createRandomSource, createZoo } from '../core/engine.js';
import { advanceDay } from '../sim/day.js';
import {
  breedAnimals, buildEnclosure, buyAnimal, buyFood, cureAnimal, fireEmployee, hireEmployee, launchAdCampaign,
  refreshMarket, renameAnimal, sellAnimal, upgradeEnclosure
} from '../sim/commands.js';

export type Game = { state: ZooState; rng: RandomSource };

export type ServerOptions = {
  logger?: Logger;
  /** Builds the random source for a new game; defaults to a PRNG seeded from the config or clock. */
  randomFor?: (seed: number | undefined) => RandomSource;
};

const STATUS_BY_FAILURE: Record<FailureKind, number> = {
  InvalidSelection: 400,
  InsufficientFunds: 409,
  PolicyViolation: 409,
  IncompatibleBreeding: 409,
  GameOver: 409
};

type Command = (game: Game, body: unknown) => Outcome<unknown>;

type GameParams = { Params: { gameId: string } };

export function buildServer(options: ServerOptions = {}) {
  const app = Fastify({ logger: options.logger ?? false });
  const games = new Map<string, Game>();
  const randomFor = options.randomFor ?? ((seed) => createRandomSource({ seed }));
  let gameCounter = 0;

  app.setErrorHandler((error, _request, reply) => {
    if (error instanceof ZodError) {
      return reply.code(400).send({ error: 'invalid request', details: error.issues });
    }
    app.log.error(error);
    return reply.code(500).send({ error: 'internal error' });
  });

  const notFound = { error: 'game not found' };

  const command = (url: string, run: Command) => {
    app.post<GameParams>(`/games/:gameId${url}`, async (request, reply) => {
      const game = games.get(request.params.gameId);
      if (!game) return reply.code(404).send(notFound);
      const outcome = run(game, request.body ?? {});
      if (!outcome.ok) {
        return reply.code(STATUS_BY_FAILURE[outcome.error.kind]).send({ error: outcome.error.kind, message: outcome.error.message });
      }
      return reply.send({ result: outcome.value, state: game.state });
    });
  };

  app.get('/health', async () => ({ status: 'ok' }));

  app.post('/games', async (request, reply) => {
    const config = ConfigSchema.parse(request.body ?? {});
    const rng = randomFor(config.seed);
    const state = createZoo(config, rng);
    gameCounter += 1;
    const gameId = `game-${gameCounter}`;
    games.set(gameId, { state, rng });
    app.log.info({ gameId, name: state.name }, 'game created');
    return reply.code(201).send({ gameId, state });
  });

  app.get<GameParams>('/games/:gameId', async (request, reply) => {
    const game = games.get(request.params.gameId);
    if (!game) return reply.code(404).send(notFound);
    return reply.send(game.state);
  });

  command('/next-day', ({ state, rng }) => advanceDay(state, rng));
  command('/animals/buy', ({ state }, body) => buyAnimal(state, BuyAnimalSchema.parse(body)));
  command('/animals/sell', ({ state }, body) => sellAnimal(state, AnimalRefSchema.parse(body)));
  command('/animals/cure', ({ state }, body) => cureAnimal(state, AnimalRefSchema.parse(body)));
  command('/animals/rename', ({ state }, body) => renameAnimal(state, RenameAnimalSchema.parse(body)));
  command('/animals/breed', ({ state, rng }, body) => breedAnimals(state, BreedSchema.parse(body), rng));
  command('/market/refresh', ({ state, rng }) => refreshMarket(state, rng));
  command('/employees/hire', ({ state }, body) => hireEmployee(state, HireEmployeeSchema.parse(body)));
  command('/employees/fire', ({ state }, body) => fireEmployee(state, FireEmployeeSchema.parse(body).employeeIndex));
  command('/enclosures/build', ({ state }, body) => buildEnclosure(state, BuildEnclosureSchema.parse(body)));
  command('/enclosures/upgrade', ({ state }, body) => upgradeEnclosure(state, UpgradeEnclosureSchema.parse(body).enclosureIndex));
  command('/food/buy', ({ state }, body) => buyFood(state, AmountSchema.parse(body).amount));
  command('/ads', ({ state }, body) => launchAdCampaign(state, AmountSchema.parse(body).amount));

  return app;
}
