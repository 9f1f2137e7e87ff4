/**
 * Argument Validation Schemas
 * Using Zod for runtime validation of tool and CLI input
 */

import { z } from 'zod';
import { ValidationError } from './errors.js';

// ============================================================================
// COMMON SCHEMAS
// ============================================================================

const symbol = (label: string) => z.string().trim().min(1, `${label} required`);

export const AgentSymbolSchema = z.string()
  .trim()
  .min(3, 'Agent symbol must be at least 3 characters')
  .max(14, 'Agent symbol must be at most 14 characters');

export const WaypointSymbolSchema = symbol('Waypoint symbol')
  .regex(/^[^-]+-[^-]+(-.+)?$/, 'Waypoint symbol must look like SECTOR-SYSTEM-WAYPOINT');

// ============================================================================
// REQUEST SCHEMAS
// ============================================================================

export const RegisterSchema = z.object({
  symbol: AgentSymbolSchema,
  faction: z.string().trim().min(1).toUpperCase().default('COSMIC')
});

export const AgentArgsSchema = z.object({
  agentSymbol: symbol('Agent symbol')
});

export const PublicAgentArgsSchema = z.object({
  symbol: symbol('Agent symbol')
});

export const FactionArgsSchema = z.object({
  factionSymbol: symbol('Faction symbol')
});

export const ShipArgsSchema = AgentArgsSchema.extend({
  shipSymbol: symbol('Ship symbol')
});

export const ContractArgsSchema = AgentArgsSchema.extend({
  contractId: symbol('Contract ID')
});

export const WaypointArgsSchema = AgentArgsSchema.extend({
  waypointSymbol: WaypointSymbolSchema
});

export const ListWaypointsSchema = AgentArgsSchema.extend({
  systemSymbol: symbol('System symbol'),
  type: z.string().trim().min(1).optional(),
  trait: z.string().trim().min(1).optional()
});

export const NavigateSchema = ShipArgsSchema.extend({
  waypointSymbol: WaypointSymbolSchema
});

export const SellCargoSchema = ShipArgsSchema.extend({
  cargoSymbol: symbol('Cargo symbol'),
  units: z.number().int().min(1, 'Units must be at least 1')
});

export const JettisonCargoSchema = SellCargoSchema;

export const TransferCargoSchema = ShipArgsSchema.extend({
  destinationShip: symbol('Destination ship symbol'),
  cargoSymbol: symbol('Cargo symbol'),
  units: z.number().int().min(1, 'Units must be at least 1')
});

export const DeliverContractSchema = ContractArgsSchema.extend({
  shipSymbol: symbol('Ship symbol'),
  tradeSymbol: symbol('Trade symbol'),
  units: z.number().int().min(1, 'Units must be at least 1')
});

export const PurchaseShipSchema = AgentArgsSchema.extend({
  shipType: symbol('Ship type').toUpperCase(),
  waypointSymbol: WaypointSymbolSchema
});

export const RefineProduceSchema = z.enum([
  'IRON', 'COPPER', 'SILVER', 'GOLD', 'ALUMINUM', 'PLATINUM', 'URANITE', 'MERITIUM', 'FUEL'
]);

export const RefineSchema = ShipArgsSchema.extend({
  produce: z.string().trim().toUpperCase().pipe(RefineProduceSchema)
});

export const ListAgentsSchema = AgentArgsSchema.extend({
  page: z.number().int().min(1).optional(),
  limit: z.number().int().min(1).max(20).optional()
});

// ============================================================================
// HELPERS
// ============================================================================

export function parseArgs<S extends z.ZodTypeAny>(schema: S, args: unknown): z.output<S> {
  const result = schema.safeParse(args ?? {});
  if (!result.success) {
    throw ValidationError.fromZod(result.error);
  }
  return result.data;
}

/** `X1-DF55-20250Z` → `X1-DF55` */
export function systemOf(waypointSymbol: string): string {
  return waypointSymbol.split('-').slice(0, 2).join('-');
}

// ============================================================================
// TYPE EXPORTS
// ============================================================================

export type RegisterRequest = z.infer<typeof RegisterSchema>;
