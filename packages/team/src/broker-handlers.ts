import { BROKER_PARAM_VALIDATORS } from "@teamwire/schemas";
import type { BrokerMethodParams } from "@teamwire/schemas";
import { Dispatcher } from "@teamwire/protocol";
import type { HandlerTable } from "@teamwire/protocol";
import type { CallContext, TeamAuthority } from "./team-authority.js";

export type BrokerDispatcher = Dispatcher<BrokerMethodParams, CallContext>;

/** The broker's method table. `team.event` is deliberately absent: it only flows broker → client. */
export function createBrokerDispatcher(authority: TeamAuthority): BrokerDispatcher {
  const handlers: HandlerTable<BrokerMethodParams, CallContext> = {
    register: (params, ctx) => authority.register(params, ctx),
    broadcast: (params, ctx) => authority.broadcast(params, ctx),
    ledger: (params, ctx) => authority.recordLedger(params, ctx),
    attach: (params, ctx) => authority.attach(params, ctx),
    handoff: (params, ctx) => authority.handoff(params, ctx),
    mode: (params, ctx) => authority.setMode(params, ctx),
    heartbeat: (params, ctx) => authority.heartbeat(params, ctx),
    leave: (params, ctx) => authority.leave(params, ctx),
  };
  return new Dispatcher(handlers, BROKER_PARAM_VALIDATORS);
}
