/**
 * MCP tools
 * Thin call-sites over the gateway: validate arguments, dispatch, pick the
 * fields worth showing from the payload
 */

import { z } from 'zod';
import type { CallToolResult, Tool } from '@modelcontextprotocol/sdk/types.js';
import { Gateway } from '../core/gateway.js';
import { GatewayError, describeError } from '../core/errors.js';
import { describeFailure, interpretResponse, Interpreted } from '../core/envelope.js';
import { registerAgent } from '../core/registration.js';
import { Credentials, DispatchRequest } from '../core/types.js';
import {
  AgentArgsSchema, ContractArgsSchema, DeliverContractSchema, FactionArgsSchema,
  JettisonCargoSchema, ListAgentsSchema, ListWaypointsSchema, NavigateSchema,
  PublicAgentArgsSchema, PurchaseShipSchema, RefineSchema, RegisterSchema,
  SellCargoSchema, ShipArgsSchema, TransferCargoSchema, WaypointArgsSchema,
  parseArgs, systemOf
} from '../core/validation.js';

export const NO_COOLDOWN = 'No cooldown';

// ============================================================================
// TOOL PLUMBING
// ============================================================================

export interface ToolDefinition {
  name: string;
  /** Verb phrase used in failure text: "Failed to <action>: ..." */
  action: string;
  description: string;
  inputSchema: Tool['inputSchema'];
  run(gateway: Gateway, args: unknown): Promise<string>;
}

/** A failure whose text is ready to show the caller */
export class ToolFailure extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ToolFailure';
  }
}

type PropertySchema = { type: string; description: string; items?: { type: string } };

function defineTool<S extends z.ZodTypeAny>(definition: {
  name: string;
  action: string;
  description: string;
  schema: S;
  properties?: Record<string, PropertySchema>;
  required?: string[];
  run: (gateway: Gateway, args: z.output<S>) => Promise<string>;
}): ToolDefinition {
  return {
    name: definition.name,
    action: definition.action,
    description: definition.description,
    inputSchema: {
      type: 'object',
      properties: definition.properties ?? {},
      required: definition.required ?? []
    },
    run: (gateway, args) => definition.run(gateway, parseArgs(definition.schema, args))
  };
}

const str = (description: string): PropertySchema => ({ type: 'string', description });
const num = (description: string): PropertySchema => ({ type: 'number', description });

const AGENT = { agentSymbol: str('The symbol/callsign of the agent making the request') };
const SHIP = { ...AGENT, shipSymbol: str('The symbol of the ship') };

const json = (value: unknown): string => JSON.stringify(value, null, 2);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function pick(value: unknown, keys: readonly string[]): Record<string, unknown> {
  const source = isRecord(value) ? value : {};
  return Object.fromEntries(keys.map(key => [key, source[key] ?? null]));
}

function field(value: unknown, ...path: string[]): unknown {
  let current = value;
  for (const key of path) {
    if (!isRecord(current)) return undefined;
    current = current[key];
  }
  return current;
}

function list(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

/**
 * One dispatch plus interpretation. Failures become a ToolFailure naming
 * `action`, with the remote message and status.
 */
async function step(
  gateway: Gateway,
  action: string,
  request: DispatchRequest,
  expected: number | readonly number[] = 200
): Promise<Exclude<Interpreted, { kind: 'error' }>> {
  const result = interpretResponse(await gateway.dispatcher.dispatch(request), expected);
  if (result.kind === 'error') {
    throw new ToolFailure(describeFailure(action, result));
  }
  return result;
}

const dataOf = (result: Exclude<Interpreted, { kind: 'error' }>): unknown =>
  result.kind === 'ok' ? result.data : null;

const seg = encodeURIComponent;

const AGENT_FIELDS = ['symbol', 'headquarters', 'credits', 'startingFaction', 'shipCount'] as const;
const COOLDOWN_FIELDS = ['shipSymbol', 'totalSeconds', 'remainingSeconds', 'expiration'] as const;
const TRAIT_FIELDS = ['symbol', 'name', 'description'] as const;

function cargoSummary(cargo: unknown, itemFields: readonly string[] = ['symbol', 'units']) {
  return {
    ...pick(cargo, ['capacity', 'units']),
    inventory: list(field(cargo, 'inventory')).map(item => pick(item, itemFields))
  };
}

function contractSummary(contract: unknown, fields: readonly string[]) {
  return {
    ...pick(contract, fields),
    terms: {
      deadline: field(contract, 'terms', 'deadline') ?? null,
      payment: field(contract, 'terms', 'payment') ?? {},
      deliver: list(field(contract, 'terms', 'deliver')).map(item =>
        pick(item, ['tradeSymbol', 'destinationSymbol', 'unitsRequired', 'unitsFulfilled']))
    }
  };
}

function waypointSummary(waypoint: unknown) {
  return {
    ...pick(waypoint, ['symbol', 'type', 'systemSymbol', 'x', 'y']),
    orbitals: list(field(waypoint, 'orbitals')),
    traits: list(field(waypoint, 'traits')).map(trait => pick(trait, TRAIT_FIELDS)),
    chart: field(waypoint, 'chart') ?? {}
  };
}

// ============================================================================
// AGENTS & ACCOUNT
// ============================================================================

const registerAgentTool = defineTool({
  name: 'register_agent',
  action: 'register agent',
  description: 'Register a new agent with the account token and store the agent token it is issued. '
    + 'New agents start with a command ship, credits and a faction contract.',
  schema: RegisterSchema,
  properties: {
    symbol: str('Callsign for the new agent (3-14 characters)'),
    faction: str('Starting faction symbol (default COSMIC)')
  },
  required: ['symbol'],
  run: async (gateway, args) => {
    const outcome = await registerAgent(gateway, args);
    if (!outcome.ok) {
      throw new ToolFailure(describeFailure('register agent', {
        kind: 'error',
        status: outcome.status,
        message: outcome.message
      }));
    }
    return `Successfully registered agent ${outcome.symbol} with faction ${outcome.faction}. `
      + 'Token has been stored for future use.';
  }
});

const listStoredAgents = defineTool({
  name: 'list_stored_agents',
  action: 'list stored agents',
  description: 'List the agent symbols this gateway holds tokens for',
  schema: z.object({}),
  run: async (gateway) => json({ agents: gateway.credentials.symbols() })
});

const serverStatus = defineTool({
  name: 'server_status',
  action: 'get server status',
  description: 'Get the game server status, reset dates and leaderboards (no authentication)',
  schema: z.object({}),
  run: async (gateway) => json(dataOf(await step(gateway, 'get server status', {
    method: 'GET', path: '', credential: Credentials.none
  })))
});

const viewAgent = defineTool({
  name: 'view_agent',
  action: 'get agent details',
  description: "Get the agent's credits, headquarters, starting faction and ship count",
  schema: AgentArgsSchema,
  properties: AGENT,
  required: ['agentSymbol'],
  run: async (gateway, { agentSymbol }) => {
    const result = await step(gateway, 'get agent details', {
      method: 'GET', path: 'my/agent', credential: Credentials.agent(agentSymbol)
    });
    return json(pick(dataOf(result), AGENT_FIELDS));
  }
});

const listAgents = defineTool({
  name: 'list_agents',
  action: 'list agents',
  description: 'List all agents in the game, paginated',
  schema: ListAgentsSchema,
  properties: {
    ...AGENT,
    page: num('Page number, starting at 1'),
    limit: num('Agents per page, at most 20')
  },
  required: ['agentSymbol'],
  run: async (gateway, { agentSymbol, page, limit }) => {
    const query = new URLSearchParams();
    if (page) query.append('page', String(page));
    if (limit) query.append('limit', String(limit));
    const suffix = query.toString() ? `?${query.toString()}` : '';

    const result = await step(gateway, 'list agents', {
      method: 'GET', path: `agents${suffix}`, credential: Credentials.agent(agentSymbol)
    });
    return json({
      agents: list(dataOf(result)).map(agent => pick(agent, ['accountId', ...AGENT_FIELDS])),
      meta: pick(result.kind === 'ok' ? result.meta : undefined, ['total', 'page', 'limit'])
    });
  }
});

const getPublicAgent = defineTool({
  name: 'get_public_agent',
  action: 'get public agent details',
  description: 'Get the public details of any agent by symbol (no authentication)',
  schema: PublicAgentArgsSchema,
  properties: { symbol: str('The symbol of the agent to look up') },
  required: ['symbol'],
  run: async (gateway, { symbol }) => {
    const result = await step(gateway, 'get public agent details', {
      method: 'GET', path: `agents/${seg(symbol)}`, credential: Credentials.none
    });
    return json(pick(dataOf(result), AGENT_FIELDS));
  }
});

// ============================================================================
// FACTIONS
// ============================================================================

const listFactions = defineTool({
  name: 'list_factions',
  action: 'list factions',
  description: 'List all factions with their headquarters and traits, to help pick a starting faction',
  schema: z.object({}),
  run: async (gateway) => {
    const result = await step(gateway, 'list factions', {
      method: 'GET', path: 'factions', credential: Credentials.account
    });
    return json(list(dataOf(result)).map(faction => ({
      ...pick(faction, ['symbol', 'name', 'description', 'headquarters']),
      traits: list(field(faction, 'traits')).map(trait => field(trait, 'name') ?? null)
    })));
  }
});

const getFaction = defineTool({
  name: 'get_faction',
  action: 'get faction',
  description: 'View the details of one faction',
  schema: FactionArgsSchema,
  properties: { factionSymbol: str('The faction symbol, e.g. COSMIC') },
  required: ['factionSymbol'],
  run: async (gateway, { factionSymbol }) => json(dataOf(await step(gateway, 'get faction', {
    method: 'GET', path: `factions/${seg(factionSymbol)}`, credential: Credentials.account
  })))
});

// ============================================================================
// CONTRACTS
// ============================================================================

const listContracts = defineTool({
  name: 'list_contracts',
  action: 'list contracts',
  description: "List the agent's contracts",
  schema: AgentArgsSchema,
  properties: AGENT,
  required: ['agentSymbol'],
  run: async (gateway, { agentSymbol }) => json(dataOf(await step(gateway, 'list contracts', {
    method: 'GET', path: 'my/contracts', credential: Credentials.agent(agentSymbol)
  })))
});

const getContract = defineTool({
  name: 'get_contract',
  action: 'get contract',
  description: 'View one contract',
  schema: ContractArgsSchema,
  properties: { ...AGENT, contractId: str('The contract ID') },
  required: ['agentSymbol', 'contractId'],
  run: async (gateway, { agentSymbol, contractId }) => json(dataOf(await step(gateway, 'get contract', {
    method: 'GET', path: `my/contracts/${seg(contractId)}`, credential: Credentials.agent(agentSymbol)
  })))
});

const acceptContract = defineTool({
  name: 'accept_contract',
  action: 'accept contract',
  description: 'Accept a contract and receive its up-front payment',
  schema: ContractArgsSchema,
  properties: { ...AGENT, contractId: str('The contract ID') },
  required: ['agentSymbol', 'contractId'],
  run: async (gateway, { agentSymbol, contractId }) => json(dataOf(await step(gateway, 'accept contract', {
    method: 'POST', path: `my/contracts/${seg(contractId)}/accept`, credential: Credentials.agent(agentSymbol)
  })))
});

const negotiateContract = defineTool({
  name: 'negotiate_contract',
  action: 'negotiate contract',
  description: 'Negotiate a new contract with a ship at a faction waypoint. An agent holds one active contract at a time.',
  schema: ShipArgsSchema,
  properties: { ...AGENT, shipSymbol: str('The ship to negotiate with') },
  required: ['agentSymbol', 'shipSymbol'],
  run: async (gateway, { agentSymbol, shipSymbol }) => {
    const result = await step(gateway, 'negotiate contract', {
      method: 'POST',
      path: `my/ships/${seg(shipSymbol)}/negotiate/contract`,
      credential: Credentials.agent(agentSymbol)
    }, 201);
    return json(contractSummary(field(dataOf(result), 'contract'), ['id', 'factionSymbol', 'type']));
  }
});

const deliverContractCargo = defineTool({
  name: 'deliver_contract_cargo',
  action: 'deliver cargo',
  description: "Deliver cargo toward a contract. The ship must be at the contract's destination with the goods in its hold.",
  schema: DeliverContractSchema,
  properties: {
    ...AGENT,
    contractId: str('The contract ID'),
    shipSymbol: str('The ship carrying the cargo'),
    tradeSymbol: str('The trade symbol to deliver'),
    units: num('Number of units to deliver')
  },
  required: ['agentSymbol', 'contractId', 'shipSymbol', 'tradeSymbol', 'units'],
  run: async (gateway, { agentSymbol, contractId, shipSymbol, tradeSymbol, units }) => {
    const result = await step(gateway, 'deliver cargo', {
      method: 'POST',
      path: `my/contracts/${seg(contractId)}/deliver`,
      credential: Credentials.agent(agentSymbol),
      body: { shipSymbol, tradeSymbol, units }
    });
    const data = dataOf(result);
    return json({
      contract: contractSummary(field(data, 'contract'), ['id', 'factionSymbol', 'type', 'fulfilled']),
      cargo: cargoSummary(field(data, 'cargo'))
    });
  }
});

const fulfillContract = defineTool({
  name: 'fulfill_contract',
  action: 'fulfill contract',
  description: 'Complete a contract whose delivery terms are all met and collect the remaining payment',
  schema: ContractArgsSchema,
  properties: { ...AGENT, contractId: str('The contract ID') },
  required: ['agentSymbol', 'contractId'],
  run: async (gateway, { agentSymbol, contractId }) => {
    const result = await step(gateway, 'fulfill contract', {
      method: 'POST', path: `my/contracts/${seg(contractId)}/fulfill`, credential: Credentials.agent(agentSymbol)
    });
    const data = dataOf(result);
    return json({
      agent: { credits: field(data, 'agent', 'credits') ?? null },
      contract: contractSummary(field(data, 'contract'), ['id', 'factionSymbol', 'type', 'fulfilled', 'accepted'])
    });
  }
});

// ============================================================================
// SYSTEMS & WAYPOINTS
// ============================================================================

const listWaypoints = defineTool({
  name: 'list_waypoints',
  action: 'list waypoints',
  description: 'List waypoints in a system, optionally filtered by type and trait',
  schema: ListWaypointsSchema,
  properties: {
    ...AGENT,
    systemSymbol: str('The system symbol, e.g. X1-DF55'),
    type: str('Optional waypoint type, e.g. ASTEROID or PLANET'),
    trait: str('Optional trait, e.g. SHIPYARD or MARKETPLACE')
  },
  required: ['agentSymbol', 'systemSymbol'],
  run: async (gateway, { agentSymbol, systemSymbol, type, trait }) => {
    const query = new URLSearchParams();
    if (type) query.append('type', type);
    if (trait) query.append('traits', trait);
    const suffix = query.toString() ? `?${query.toString()}` : '';

    const result = await step(gateway, 'list waypoints', {
      method: 'GET',
      path: `systems/${seg(systemSymbol)}/waypoints${suffix}`,
      credential: Credentials.agent(agentSymbol)
    });
    return json(list(dataOf(result)).map(waypoint => ({
      ...pick(waypoint, ['symbol', 'type', 'systemSymbol', 'x', 'y']),
      orbitals: list(field(waypoint, 'orbitals')),
      traits: list(field(waypoint, 'traits')).map(t => pick(t, TRAIT_FIELDS)),
      faction: field(waypoint, 'faction', 'symbol') ?? null
    })));
  }
});

const viewMarket = defineTool({
  name: 'view_market',
  action: 'get market',
  description: 'View imports, exports and (with a ship present) trade prices at a marketplace waypoint',
  schema: WaypointArgsSchema,
  properties: { ...AGENT, waypointSymbol: str('The marketplace waypoint symbol') },
  required: ['agentSymbol', 'waypointSymbol'],
  run: async (gateway, { agentSymbol, waypointSymbol }) => json(dataOf(await step(gateway, 'get market', {
    method: 'GET',
    path: `systems/${seg(systemOf(waypointSymbol))}/waypoints/${seg(waypointSymbol)}/market`,
    credential: Credentials.agent(agentSymbol)
  })))
});

const viewShipyard = defineTool({
  name: 'view_shipyard',
  action: 'get shipyard',
  description: 'View the ship types (and, with a ship present, prices) at a shipyard waypoint',
  schema: WaypointArgsSchema,
  properties: { ...AGENT, waypointSymbol: str('The shipyard waypoint symbol') },
  required: ['agentSymbol', 'waypointSymbol'],
  run: async (gateway, { agentSymbol, waypointSymbol }) => json(dataOf(await step(gateway, 'get shipyard', {
    method: 'GET',
    path: `systems/${seg(systemOf(waypointSymbol))}/waypoints/${seg(waypointSymbol)}/shipyard`,
    credential: Credentials.agent(agentSymbol)
  })))
});

// ============================================================================
// SHIPS
// ============================================================================

const shipPath = (shipSymbol: string, action = '') =>
  `my/ships/${seg(shipSymbol)}${action ? `/${action}` : ''}`;

const listShips = defineTool({
  name: 'list_ships',
  action: 'list ships',
  description: 'List all ships under the agent\'s command',
  schema: AgentArgsSchema,
  properties: AGENT,
  required: ['agentSymbol'],
  run: async (gateway, { agentSymbol }) => {
    const result = await step(gateway, 'list ships', {
      method: 'GET', path: 'my/ships', credential: Credentials.agent(agentSymbol)
    });
    return json(list(dataOf(result)).map(ship => ({
      symbol: field(ship, 'symbol') ?? null,
      registration: pick(field(ship, 'registration'), ['name', 'role']),
      nav: {
        status: field(ship, 'nav', 'status') ?? null,
        location: field(ship, 'nav', 'waypointSymbol') ?? null
      },
      cargo: pick(field(ship, 'cargo'), ['capacity', 'units'])
    })));
  }
});

const viewShip = defineTool({
  name: 'view_ship',
  action: 'get ship details',
  description: 'View the full state of one ship',
  schema: ShipArgsSchema,
  properties: SHIP,
  required: ['agentSymbol', 'shipSymbol'],
  run: async (gateway, { agentSymbol, shipSymbol }) => json(dataOf(await step(gateway, 'get ship details', {
    method: 'GET', path: shipPath(shipSymbol), credential: Credentials.agent(agentSymbol)
  })))
});

const orbitShip = defineTool({
  name: 'orbit_ship',
  action: 'orbit ship',
  description: 'Move a docked ship into orbit at its current waypoint',
  schema: ShipArgsSchema,
  properties: SHIP,
  required: ['agentSymbol', 'shipSymbol'],
  run: async (gateway, { agentSymbol, shipSymbol }) => json(field(dataOf(await step(gateway, 'orbit ship', {
    method: 'POST', path: shipPath(shipSymbol, 'orbit'), credential: Credentials.agent(agentSymbol)
  })), 'nav') ?? null)
});

const dockShip = defineTool({
  name: 'dock_ship',
  action: 'dock ship',
  description: 'Dock an orbiting ship at its current waypoint',
  schema: ShipArgsSchema,
  properties: SHIP,
  required: ['agentSymbol', 'shipSymbol'],
  run: async (gateway, { agentSymbol, shipSymbol }) => json(field(dataOf(await step(gateway, 'dock ship', {
    method: 'POST', path: shipPath(shipSymbol, 'dock'), credential: Credentials.agent(agentSymbol)
  })), 'nav') ?? null)
});

const navigateShip = defineTool({
  name: 'navigate_ship',
  action: 'navigate ship',
  description: 'Navigate an orbiting ship to a waypoint in its current system',
  schema: NavigateSchema,
  properties: { ...SHIP, waypointSymbol: str('The destination waypoint symbol') },
  required: ['agentSymbol', 'shipSymbol', 'waypointSymbol'],
  run: async (gateway, { agentSymbol, shipSymbol, waypointSymbol }) => {
    const result = await step(gateway, 'navigate ship', {
      method: 'POST',
      path: shipPath(shipSymbol, 'navigate'),
      credential: Credentials.agent(agentSymbol),
      body: { waypointSymbol }
    });
    return json(pick(dataOf(result), ['nav', 'fuel', 'events']));
  }
});

const refuelShip = defineTool({
  name: 'refuel_ship',
  action: 'refuel ship',
  description: 'Refuel a docked ship at a marketplace that sells fuel',
  schema: ShipArgsSchema,
  properties: SHIP,
  required: ['agentSymbol', 'shipSymbol'],
  run: async (gateway, { agentSymbol, shipSymbol }) => {
    const result = await step(gateway, 'refuel ship', {
      method: 'POST', path: shipPath(shipSymbol, 'refuel'), credential: Credentials.agent(agentSymbol)
    });
    return json({
      credits: field(dataOf(result), 'agent', 'credits') ?? null,
      fuel: field(dataOf(result), 'fuel') ?? null,
      transaction: field(dataOf(result), 'transaction') ?? null
    });
  }
});

const viewCargo = defineTool({
  name: 'view_cargo',
  action: 'get ship cargo',
  description: "View a ship's cargo hold",
  schema: ShipArgsSchema,
  properties: SHIP,
  required: ['agentSymbol', 'shipSymbol'],
  run: async (gateway, { agentSymbol, shipSymbol }) => json(dataOf(await step(gateway, 'get ship cargo', {
    method: 'GET', path: shipPath(shipSymbol, 'cargo'), credential: Credentials.agent(agentSymbol)
  })))
});

/**
 * Look up the ship's nav status. A failed lookup is not fatal: the caller
 * goes ahead and lets the following request report the real problem.
 */
async function navStatus(gateway: Gateway, agentSymbol: string, shipSymbol: string): Promise<unknown> {
  const response = await gateway.dispatcher.dispatch({
    method: 'GET', path: shipPath(shipSymbol), credential: Credentials.agent(agentSymbol)
  });
  const result = interpretResponse(response, 200);
  return result.kind === 'ok' ? field(result.data, 'nav', 'status') : undefined;
}

const sellCargo = defineTool({
  name: 'sell_cargo',
  action: 'sell cargo',
  description: 'Sell cargo at the current marketplace. Docks the ship first if it is not docked.',
  schema: SellCargoSchema,
  properties: {
    ...SHIP,
    cargoSymbol: str('The trade symbol of the cargo to sell'),
    units: num('Number of units to sell')
  },
  required: ['agentSymbol', 'shipSymbol', 'cargoSymbol', 'units'],
  run: async (gateway, { agentSymbol, shipSymbol, cargoSymbol, units }) => {
    const status = await navStatus(gateway, agentSymbol, shipSymbol);
    if (status !== undefined && status !== 'DOCKED') {
      await step(gateway, 'dock before selling', {
        method: 'POST', path: shipPath(shipSymbol, 'dock'), credential: Credentials.agent(agentSymbol)
      });
    }

    const result = await step(gateway, 'sell cargo', {
      method: 'POST',
      path: shipPath(shipSymbol, 'sell'),
      credential: Credentials.agent(agentSymbol),
      body: { symbol: cargoSymbol, units }
    }, 201);

    const data = dataOf(result);
    return json({
      agent: { credits: field(data, 'agent', 'credits') ?? null },
      cargo: cargoSummary(field(data, 'cargo')),
      transaction: pick(field(data, 'transaction'), [
        'waypointSymbol', 'tradeSymbol', 'type', 'units', 'pricePerUnit', 'totalPrice'
      ])
    });
  }
});

const extractResources = defineTool({
  name: 'extract_resources',
  action: 'extract resources',
  description: 'Extract resources at the current asteroid field. Moves the ship into orbit first if needed.',
  schema: ShipArgsSchema,
  properties: SHIP,
  required: ['agentSymbol', 'shipSymbol'],
  run: async (gateway, { agentSymbol, shipSymbol }) => {
    const status = await navStatus(gateway, agentSymbol, shipSymbol);
    if (status !== undefined && status !== 'IN_ORBIT') {
      await step(gateway, 'orbit before extracting', {
        method: 'POST', path: shipPath(shipSymbol, 'orbit'), credential: Credentials.agent(agentSymbol)
      });
    }

    const result = await step(gateway, 'extract resources', {
      method: 'POST', path: shipPath(shipSymbol, 'extract'), credential: Credentials.agent(agentSymbol)
    }, 201);
    return json(pick(dataOf(result), ['extraction', 'cooldown', 'cargo']));
  }
});

const getShipCooldown = defineTool({
  name: 'get_ship_cooldown',
  action: 'get ship cooldown',
  description: "Check a ship's reactor cooldown. Returns \"No cooldown\" when none is active.",
  schema: ShipArgsSchema,
  properties: SHIP,
  required: ['agentSymbol', 'shipSymbol'],
  run: async (gateway, { agentSymbol, shipSymbol }) => {
    const result = await step(gateway, 'get ship cooldown', {
      method: 'GET', path: shipPath(shipSymbol, 'cooldown'), credential: Credentials.agent(agentSymbol)
    });
    if (result.kind === 'empty') {
      return NO_COOLDOWN;
    }
    return json(pick(result.data, ['shipSymbol', 'totalSeconds', 'remainingSeconds', 'expiration']));
  }
});

const createSurvey = defineTool({
  name: 'create_survey',
  action: 'create survey',
  description: 'Survey the current waypoint with a ship that has a surveyor mount',
  schema: ShipArgsSchema,
  properties: SHIP,
  required: ['agentSymbol', 'shipSymbol'],
  run: async (gateway, { agentSymbol, shipSymbol }) => {
    const result = await step(gateway, 'create survey', {
      method: 'POST', path: shipPath(shipSymbol, 'survey'), credential: Credentials.agent(agentSymbol)
    }, 201);
    return json({
      cooldown: field(dataOf(result), 'cooldown') ?? null,
      surveys: list(field(dataOf(result), 'surveys'))
    });
  }
});

const purchaseShip = defineTool({
  name: 'purchase_ship',
  action: 'purchase ship',
  description: 'Buy a ship at a shipyard where one of your ships is present',
  schema: PurchaseShipSchema,
  properties: {
    ...AGENT,
    shipType: str('The ship type, e.g. SHIP_MINING_DRONE'),
    waypointSymbol: str('The shipyard waypoint symbol')
  },
  required: ['agentSymbol', 'shipType', 'waypointSymbol'],
  run: async (gateway, { agentSymbol, shipType, waypointSymbol }) => {
    const result = await step(gateway, 'purchase ship', {
      method: 'POST',
      path: 'my/ships',
      credential: Credentials.agent(agentSymbol),
      body: { shipType, waypointSymbol }
    }, 201);
    const data = dataOf(result);
    const ship = field(data, 'ship');
    return json({
      agent: pick(field(data, 'agent'), ['credits', 'shipCount']),
      ship: {
        symbol: field(ship, 'symbol') ?? null,
        registration: pick(field(ship, 'registration'), ['name', 'role']),
        nav: {
          status: field(ship, 'nav', 'status') ?? null,
          location: field(ship, 'nav', 'waypointSymbol') ?? null
        },
        frame: pick(field(ship, 'frame'), ['symbol', 'moduleSlots', 'mountingPoints', 'fuelCapacity']),
        reactor: pick(field(ship, 'reactor'), ['symbol', 'powerOutput']),
        engine: pick(field(ship, 'engine'), ['symbol', 'speed']),
        modules: list(field(ship, 'modules')),
        mounts: list(field(ship, 'mounts')),
        cargo: pick(field(ship, 'cargo'), ['capacity', 'units'])
      },
      transaction: pick(field(data, 'transaction'), ['waypointSymbol', 'shipSymbol', 'price', 'agentSymbol'])
    });
  }
});

const jettisonCargo = defineTool({
  name: 'jettison_cargo',
  action: 'jettison cargo',
  description: "Throw cargo out of a ship's hold",
  schema: JettisonCargoSchema,
  properties: {
    ...SHIP,
    cargoSymbol: str('The trade symbol of the cargo to jettison'),
    units: num('Number of units to jettison')
  },
  required: ['agentSymbol', 'shipSymbol', 'cargoSymbol', 'units'],
  run: async (gateway, { agentSymbol, shipSymbol, cargoSymbol, units }) => {
    const result = await step(gateway, 'jettison cargo', {
      method: 'POST',
      path: shipPath(shipSymbol, 'jettison'),
      credential: Credentials.agent(agentSymbol),
      body: { symbol: cargoSymbol, units }
    });
    return json({ cargo: cargoSummary(field(dataOf(result), 'cargo')) });
  }
});

const transferCargo = defineTool({
  name: 'transfer_cargo',
  action: 'transfer cargo',
  description: 'Move cargo between two ships at the same waypoint and in the same nav state',
  schema: TransferCargoSchema,
  properties: {
    ...AGENT,
    shipSymbol: str('The ship giving the cargo'),
    destinationShip: str('The ship receiving the cargo'),
    cargoSymbol: str('The trade symbol of the cargo to transfer'),
    units: num('Number of units to transfer')
  },
  required: ['agentSymbol', 'shipSymbol', 'destinationShip', 'cargoSymbol', 'units'],
  run: async (gateway, { agentSymbol, shipSymbol, destinationShip, cargoSymbol, units }) => {
    const result = await step(gateway, 'transfer cargo', {
      method: 'POST',
      path: shipPath(shipSymbol, 'transfer'),
      credential: Credentials.agent(agentSymbol),
      body: { tradeSymbol: cargoSymbol, units, shipSymbol: destinationShip }
    });
    return json({
      cargo: cargoSummary(field(dataOf(result), 'cargo'), ['symbol', 'name', 'description', 'units'])
    });
  }
});

const refineShip = defineTool({
  name: 'refine_ship',
  action: 'refine materials',
  description: 'Refine raw goods aboard a ship with a refinery module (100 raw units become 10 refined)',
  schema: RefineSchema,
  properties: {
    ...SHIP,
    produce: str('Good to produce: IRON, COPPER, SILVER, GOLD, ALUMINUM, PLATINUM, URANITE, MERITIUM or FUEL')
  },
  required: ['agentSymbol', 'shipSymbol', 'produce'],
  run: async (gateway, { agentSymbol, shipSymbol, produce }) => {
    const result = await step(gateway, 'refine materials', {
      method: 'POST',
      path: shipPath(shipSymbol, 'refine'),
      credential: Credentials.agent(agentSymbol),
      body: { produce }
    }, [200, 201]);
    const data = dataOf(result);
    const goods = (key: string) => list(field(data, key)).map(item => pick(item, ['tradeSymbol', 'units']));
    return json({
      cargo: cargoSummary(field(data, 'cargo'), ['symbol', 'name', 'description', 'units']),
      cooldown: pick(field(data, 'cooldown'), COOLDOWN_FIELDS),
      produced: goods('produced'),
      consumed: goods('consumed')
    });
  }
});

/** Sensor-array scans share a request shape and differ in what they return */
function scanTool(target: 'systems' | 'waypoints' | 'ships', shape: (item: unknown) => unknown) {
  return defineTool({
    name: `scan_${target}`,
    action: `scan ${target}`,
    description: `Scan for nearby ${target} with a ship's sensor array. The ship enters a cooldown afterwards.`,
    schema: ShipArgsSchema,
    properties: SHIP,
    required: ['agentSymbol', 'shipSymbol'],
    run: async (gateway, { agentSymbol, shipSymbol }) => {
      const result = await step(gateway, `scan ${target}`, {
        method: 'POST', path: shipPath(shipSymbol, `scan/${target}`), credential: Credentials.agent(agentSymbol)
      }, 201);
      const data = dataOf(result);
      return json({
        [target]: list(field(data, target)).map(shape),
        cooldown: pick(field(data, 'cooldown'), COOLDOWN_FIELDS)
      });
    }
  });
}

const scanSystems = scanTool('systems', system =>
  pick(system, ['symbol', 'sectorSymbol', 'type', 'x', 'y', 'distance']));

const scanWaypoints = scanTool('waypoints', waypointSummary);

const scanShips = scanTool('ships', ship => ({
  symbol: field(ship, 'symbol') ?? null,
  registration: pick(field(ship, 'registration'), ['name', 'role', 'factionSymbol']),
  nav: pick(field(ship, 'nav'), ['systemSymbol', 'waypointSymbol', 'status']),
  frame: pick(field(ship, 'frame'), ['symbol'])
}));

const chartWaypoint = defineTool({
  name: 'chart_waypoint',
  action: 'chart waypoint',
  description: "Chart the ship's current waypoint, revealing its traits to every agent",
  schema: ShipArgsSchema,
  properties: SHIP,
  required: ['agentSymbol', 'shipSymbol'],
  run: async (gateway, { agentSymbol, shipSymbol }) => {
    const result = await step(gateway, 'chart waypoint', {
      method: 'POST', path: shipPath(shipSymbol, 'chart'), credential: Credentials.agent(agentSymbol)
    }, 201);
    const data = dataOf(result);
    return json({
      chart: pick(field(data, 'chart'), ['waypointSymbol', 'submittedBy', 'submittedOn']),
      waypoint: waypointSummary(field(data, 'waypoint'))
    });
  }
});

// ============================================================================
// REGISTRY
// ============================================================================

export const TOOLS: readonly ToolDefinition[] = [
  registerAgentTool,
  listStoredAgents,
  serverStatus,
  viewAgent,
  listAgents,
  getPublicAgent,
  listFactions,
  getFaction,
  listContracts,
  getContract,
  acceptContract,
  negotiateContract,
  deliverContractCargo,
  fulfillContract,
  listWaypoints,
  viewMarket,
  viewShipyard,
  listShips,
  viewShip,
  orbitShip,
  dockShip,
  navigateShip,
  refuelShip,
  viewCargo,
  sellCargo,
  extractResources,
  getShipCooldown,
  createSurvey,
  purchaseShip,
  jettisonCargo,
  transferCargo,
  refineShip,
  scanSystems,
  scanWaypoints,
  scanShips,
  chartWaypoint
];

const TOOLS_BY_NAME = new Map(TOOLS.map(tool => [tool.name, tool]));

function errorResult(text: string): CallToolResult {
  return { content: [{ type: 'text', text }], isError: true };
}

export async function callTool(gateway: Gateway, name: string, args: unknown): Promise<CallToolResult> {
  const tool = TOOLS_BY_NAME.get(name);
  if (!tool) {
    return errorResult(`Unknown tool: ${name}`);
  }

  try {
    const text = await tool.run(gateway, args);
    return { content: [{ type: 'text', text }] };
  } catch (error) {
    if (error instanceof ToolFailure) {
      return errorResult(error.message);
    }
    if (error instanceof GatewayError) {
      return errorResult(`Failed to ${tool.action}: ${error.message}`);
    }
    return errorResult(describeError(error));
  }
}
