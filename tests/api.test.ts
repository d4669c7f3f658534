import { afterAll, beforeAll, describe, expect, it } from 'vitest';
import { buildServer } from '../src/api/server.js';

const config = {
  seed: 7,
  zoo: { name: 'Harbor Zoo', initialMoney: 1000 },
  rules: { randomEvents: false, disease: false, popularityDrift: false }
};

describe('zoo api', () => {
  const app = buildServer();
  let gameId = '';

  beforeAll(async () => {
    await app.ready();
    const response = await app.inject({ method: 'POST', url: '/games', payload: config });
    const body = JSON.parse(response.payload) as { gameId: string };
    gameId = body.gameId;
  });

  afterAll(async () => {
    await app.close();
  });

  it('creates a game with a stocked market', async () => {
    const response = await app.inject({ method: 'GET', url: `/games/${gameId}` });
    const body = JSON.parse(response.payload) as { name: string; money: number; market: unknown[] };
    expect(gameId).toBe('game-1');
    expect(response.statusCode).toBe(200);
    expect(body.name).toBe('Harbor Zoo');
    expect(body.money).toBe(1000);
    expect(body.market).toHaveLength(10);
  });

  it('builds an enclosure and settles a day', async () => {
    const build = await app.inject({
      method: 'POST',
      url: `/games/${gameId}/enclosures/build`,
      payload: { climate: 'Forest', capacity: 2 }
    });
    const built = JSON.parse(build.payload) as { result: { cost: number }; state: { money: number } };
    expect(build.statusCode).toBe(200);
    expect(built.result.cost).toBe(170);
    expect(built.state.money).toBe(830);

    const next = await app.inject({ method: 'POST', url: `/games/${gameId}/next-day` });
    const settled = JSON.parse(next.payload) as { result: { day: number }; state: { day: number; money: number } };
    expect(next.statusCode).toBe(200);
    expect(settled.result.day).toBe(1);
    expect(settled.state).toMatchObject({ day: 2, money: 765 });
  });

  it('answers 409 when money is short', async () => {
    const response = await app.inject({
      method: 'POST',
      url: `/games/${gameId}/enclosures/build`,
      payload: { climate: 'Forest', capacity: 100 }
    });
    const body = JSON.parse(response.payload) as { error: string; message: string };
    expect(response.statusCode).toBe(409);
    expect(body).toEqual({ error: 'InsufficientFunds', message: 'Not enough money: 1150 needed, 765 available.' });
  });

  it('answers 400 for an invalid selection', async () => {
    const response = await app.inject({ method: 'POST', url: `/games/${gameId}/food/buy`, payload: { amount: 0 } });
    const body = JSON.parse(response.payload) as { error: string; message: string };
    expect(response.statusCode).toBe(400);
    expect(body).toEqual({ error: 'InvalidSelection', message: 'The amount must be a positive number of kilograms.' });
  });

  it('rejects malformed requests', async () => {
    const hire = await app.inject({
      method: 'POST',
      url: `/games/${gameId}/employees/hire`,
      payload: { name: 'Lee', position: 'Director' }
    });
    expect(hire.statusCode).toBe(400);
    expect((JSON.parse(hire.payload) as { error: string }).error).toBe('invalid request');

    const create = await app.inject({ method: 'POST', url: '/games', payload: { zoo: { initialMoney: -5 } } });
    expect(create.statusCode).toBe(400);
  });

  it('answers 404 for an unknown game', async () => {
    const response = await app.inject({ method: 'GET', url: '/games/game-99' });
    expect(response.statusCode).toBe(404);
    expect(JSON.parse(response.payload)).toEqual({ error: 'game not found' });
  });
});
