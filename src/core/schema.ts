import { z } from 'zod';
import { CLIMATES, HIREABLE_POSITIONS } from './constants.js';

export const RulesSchema = z.object({
  dayLimit: z.number().int().min(1).default(30),
  marketSize: z.number().int().min(1).max(50).default(10),
  marketRefreshFee: z.number().int().min(0).default(150),
  freeRefreshUntilDay: z.number().int().min(0).default(10),
  randomEvents: z.boolean().default(true),
  disease: z.boolean().default(true),
  popularityDrift: z.boolean().default(true)
});

export const ConfigSchema = z.object({
  seed: z.number().int().optional(),
  zoo: z.object({
    name: z.string().min(1).default('City Zoo'),
    initialMoney: z.number().int().min(0).default(5000),
    directorName: z.string().min(1).default('Zoo Director')
  }).default({}),
  rules: RulesSchema.default({})
});

export type ZooConfig = z.infer<typeof ConfigSchema>;

const index = z.number().int().min(0);

export const BuyAnimalSchema = z.object({
  marketIndex: index,
  enclosureIndex: index,
  name: z.string().default('')
});

export const AnimalRefSchema = z.object({
  enclosureIndex: index,
  animalIndex: index
});

export const RenameAnimalSchema = AnimalRefSchema.extend({
  name: z.string()
});

export const BreedSchema = z.object({
  enclosureIndex: index,
  selection: z.tuple([index, index]).optional(),
  names: z.array(z.string()).default([])
});

export const HireEmployeeSchema = z.object({
  name: z.string(),
  position: z.enum(HIREABLE_POSITIONS)
});

export const FireEmployeeSchema = z.object({
  employeeIndex: index
});

export const BuildEnclosureSchema = z.object({
  climate: z.enum(CLIMATES),
  capacity: z.number().int().min(1)
});

export const UpgradeEnclosureSchema = z.object({
  enclosureIndex: index
});

export const AmountSchema = z.object({
  amount: z.number().int()
});
