import { ZERO_ADDRESS, encodeTradePath, roundTrip } from "@flashpair/common";
import { describe, expect, it } from "vitest";

import { thrown } from "./__fixtures__/thrown.js";
import {
  COORDINATOR,
  MID,
  NOW,
  ORIGIN,
  OWNER,
  POOL,
  PROVIDER,
  ROGUE_POOL,
  ROUTER_A,
  ROUTER_B,
  STRANGER,
  buildTestWorld,
} from "./__fixtures__/world.js";
import type { WorldOptions } from "./__fixtures__/world.js";
import { SimulatedLendingPool } from "./lending/pool.js";

const owner = { sender: OWNER };

function setup(opts?: WorldOptions) {
  const world = buildTestWorld(opts);
  return { ...world, params: encodeTradePath(world.trade) };
}

function balances(world: ReturnType<typeof setup>) {
  const { ledger } = world;
  return {
    coordinator: [ledger.balanceOf(ORIGIN, COORDINATOR), ledger.balanceOf(MID, COORDINATOR)],
    pool: ledger.balanceOf(ORIGIN, POOL),
    routerA: [ledger.balanceOf(ORIGIN, ROUTER_A), ledger.balanceOf(MID, ROUTER_A)],
    routerB: [ledger.balanceOf(ORIGIN, ROUTER_B), ledger.balanceOf(MID, ROUTER_B)],
    allowances: [
      ledger.allowance(ORIGIN, COORDINATOR, ROUTER_A),
      ledger.allowance(MID, COORDINATOR, ROUTER_B),
      ledger.allowance(ORIGIN, COORDINATOR, POOL),
    ],
  };
}

describe("LoanCoordinator.initiate", () => {
  it("borrows, trades both legs and repays the pool", () => {
    const world = setup();
    const { coordinator, journal, ledger, params } = world;

    const outcome = coordinator.initiate(owner, ORIGIN, 1_000n, params);

    expect(outcome).toEqual({
      trace_id: expect.any(String),
      asset: ORIGIN,
      amount: 1_000n,
      premium: 0n,
      profit: 10n,
      intermediate_amount: 2_000n,
      leg1_venue: "A",
      leg2_venue: "B",
    });
    expect(ledger.balanceOf(ORIGIN, COORDINATOR)).toBe(10n);
    expect(ledger.balanceOf(ORIGIN, POOL)).toBe(1_000_000n);
    expect(journal.records().map((e) => e.type)).toEqual(["LOAN_INITIATED", "ARBITRAGE_EXECUTED"]);
    expect(journal.records()[1]).toEqual({
      type: "ARBITRAGE_EXECUTED",
      trace_id: outcome.trace_id,
      asset: ORIGIN,
      profit: 10n,
      at: NOW,
    });
    expect(coordinator.phase).toBe("IDLE");
    expect(coordinator.lastAttempt).toEqual({
      trace_id: outcome.trace_id,
      reached: "REPAYMENT_AUTHORIZED",
      terminal: "COMPLETED",
    });
  });

  it("pays the premium out of the profit", () => {
    const world = setup({ premium_bps: 9 });
    const { coordinator, ledger, params } = world;

    const outcome = coordinator.initiate(owner, ORIGIN, 10_000n, params);

    expect(outcome.premium).toBe(9n);
    expect(outcome.profit).toBe(100n);
    expect(ledger.balanceOf(ORIGIN, COORDINATOR)).toBe(91n);
    expect(ledger.balanceOf(ORIGIN, POOL)).toBe(1_000_009n);
    expect(ledger.allowance(ORIGIN, COORDINATOR, POOL)).toBe(0n);
  });

  it("rejects a caller other than the owner before requesting a loan", () => {
    const world = setup();
    const before = balances(world);

    const err = thrown(() => world.coordinator.initiate({ sender: STRANGER }, ORIGIN, 1_000n, world.params));

    expect(err.code).toBe("UNAUTHORIZED");
    expect(world.journal.records()).toHaveLength(0);
    expect(balances(world)).toEqual(before);
    expect(world.coordinator.lastAttempt).toBeNull();
  });

  it("rejects a zero amount", () => {
    const world = setup();

    const err = thrown(() => world.coordinator.initiate(owner, ORIGIN, 0n, world.params));

    expect(err.code).toBe("AMOUNT_INVALID");
  });

  it("rejects a path that does not start at the borrowed asset without swapping", () => {
    const world = setup();
    const before = balances(world);
    const params = encodeTradePath(roundTrip(MID, ORIGIN));

    const err = thrown(() => world.coordinator.initiate(owner, ORIGIN, 1_000n, params));

    expect(err.code).toBe("PATH_MISMATCH");
    expect(world.routerA.swaps + world.routerB.swaps).toBe(0);
    expect(balances(world)).toEqual(before);
    expect(world.journal.records()).toHaveLength(0);
    expect(world.coordinator.lastAttempt?.reached).toBe("FUNDS_RECEIVED");
    expect(world.coordinator.lastAttempt?.terminal).toBe("ABORTED");
  });

  it("rejects params that are not a trade path", () => {
    const world = setup();

    const err = thrown(() => world.coordinator.initiate(owner, ORIGIN, 1_000n, "0x1234"));

    expect(err.code).toBe("PATH_INVALID");
  });

  it("undoes leg 1 when leg 2 fails", () => {
    const world = setup();
    const before = balances(world);
    world.routerB.failSwap = true;

    const err = thrown(() => world.coordinator.initiate(owner, ORIGIN, 1_000n, world.params));

    expect(err.code).toBe("SWAP_FAILED");
    expect(world.routerA.swaps).toBe(1);
    expect(balances(world)).toEqual(before);
    expect(world.journal.records()).toHaveLength(0);
    expect(world.coordinator.lastAttempt?.reached).toBe("LEG1_EXECUTED");
    expect(world.coordinator.phase).toBe("IDLE");
  });

  it("aborts a round trip that only breaks even", () => {
    const world = setup();
    const before = balances(world);
    world.routerB.setRate(MID, ORIGIN, { num: 1n, den: 2n });

    const err = thrown(() => world.coordinator.initiate(owner, ORIGIN, 1_000n, world.params));

    expect(err.code).toBe("UNPROFITABLE_ARBITRAGE");
    expect(balances(world)).toEqual(before);
    expect(world.coordinator.lastAttempt?.reached).toBe("PROFIT_EVALUATED");
  });

  it("rolls back a profitable run whose profit does not cover the premium", () => {
    // 200 bps of 1000 is 20, the round trip only makes 10
    const world = setup({ premium_bps: 200 });
    const before = balances(world);

    const err = thrown(() => world.coordinator.initiate(owner, ORIGIN, 1_000n, world.params));

    expect(err.code).toBe("REPAYMENT_FAILED");
    expect(balances(world)).toEqual(before);
    expect(world.journal.records()).toHaveLength(0);
    expect(world.coordinator.lastAttempt?.reached).toBe("REPAYMENT_AUTHORIZED");
  });

  it("fails when the pool cannot lend the amount", () => {
    const world = setup({ pool_liquidity: 500n });

    const err = thrown(() => world.coordinator.initiate(owner, ORIGIN, 1_000n, world.params));

    expect(err.code).toBe("INSUFFICIENT_LIQUIDITY");
    expect(world.journal.records()).toHaveLength(0);
  });
});

describe("LoanCoordinator.onFundsReceived", () => {
  it("rejects a caller that is not the resolved pool", () => {
    const world = setup();

    const err = thrown(() =>
      world.coordinator.onFundsReceived(
        { sender: STRANGER },
        [ORIGIN],
        [1_000n],
        [0n],
        COORDINATOR,
        world.params,
      ),
    );

    expect(err.code).toBe("UNTRUSTED_CALLER");
  });

  it("rejects a loan pushed by another pool and leaves that pool whole", () => {
    const world = setup();
    const rogue = new SimulatedLendingPool({ address: ROGUE_POOL, ledger: world.ledger, host: world.host });
    world.ledger.mint(ORIGIN, ROGUE_POOL, 1_000n);

    const err = thrown(() =>
      rogue.flashLoan({ sender: STRANGER }, world.coordinator, [ORIGIN], [1_000n], [0], STRANGER, world.params, 0),
    );

    expect(err.code).toBe("UNTRUSTED_CALLER");
    expect(world.ledger.balanceOf(ORIGIN, ROGUE_POOL)).toBe(1_000n);
    expect(world.ledger.balanceOf(ORIGIN, COORDINATOR)).toBe(0n);
    expect(world.routerA.swaps).toBe(0);
  });

  it("rejects a loan from the real pool that this coordinator did not ask for", () => {
    const world = setup();

    const err = thrown(() =>
      world.pool.flashLoan({ sender: STRANGER }, world.coordinator, [ORIGIN], [1_000n], [0], STRANGER, world.params, 0),
    );

    expect(err.code).toBe("REENTRANT_CALL");
    expect(world.ledger.balanceOf(ORIGIN, POOL)).toBe(1_000_000n);
  });

  it("trusts only the pool the provider currently resolves", () => {
    const world = setup();
    const next = new SimulatedLendingPool({
      address: ROGUE_POOL,
      ledger: world.ledger,
      host: world.host,
      premium_bps: 0,
    });
    world.ledger.mint(ORIGIN, ROGUE_POOL, 1_000_000n);
    world.provider.setPool(next);
    const before = balances(world);

    const err = thrown(() =>
      world.pool.flashLoan(
        { sender: COORDINATOR },
        world.coordinator,
        [ORIGIN],
        [1_000n],
        [0],
        COORDINATOR,
        world.params,
        0,
      ),
    );

    expect(err.code).toBe("UNTRUSTED_CALLER");
    expect(balances(world)).toEqual(before);
    expect(world.routerA.swaps + world.routerB.swaps).toBe(0);

    const outcome = world.coordinator.initiate(owner, ORIGIN, 1_000n, world.params);

    expect(outcome.profit).toBe(10n);
    expect(world.ledger.balanceOf(ORIGIN, POOL)).toBe(1_000_000n);
    expect(world.ledger.balanceOf(ORIGIN, ROGUE_POOL)).toBe(1_000_000n);
  });
});

describe("LoanCoordinator re-entrancy", () => {
  it("rejects a nested initiate from inside a leg", () => {
    const world = setup();
    const nested: string[] = [];
    world.routerA.onSwap = () => {
      nested.push(thrown(() => world.coordinator.initiate(owner, ORIGIN, 1_000n, world.params)).code);
      world.coordinator.initiate(owner, ORIGIN, 1_000n, world.params);
    };

    const err = thrown(() => world.coordinator.initiate(owner, ORIGIN, 1_000n, world.params));

    expect(nested).toEqual(["REENTRANT_CALL"]);
    expect(err.code).toBe("REENTRANT_CALL");
    expect(world.ledger.balanceOf(ORIGIN, POOL)).toBe(1_000_000n);
  });

  it("rejects withdraw and a second callback while a loan is in flight", () => {
    const world = setup();
    const codes: string[] = [];
    world.routerA.onSwap = () => {
      codes.push(thrown(() => world.coordinator.withdraw(owner, ORIGIN)).code);
      codes.push(
        thrown(() =>
          world.coordinator.onFundsReceived({ sender: POOL }, [ORIGIN], [1n], [0n], COORDINATOR, world.params),
        ).code,
      );
    };

    const outcome = world.coordinator.initiate(owner, ORIGIN, 1_000n, world.params);

    expect(codes).toEqual(["REENTRANT_CALL", "REENTRANT_CALL"]);
    expect(outcome.profit).toBe(10n);
  });

  it("checks the owner before the in-flight guard on ownership transfer", () => {
    const world = setup();
    const codes: string[] = [];
    world.routerA.onSwap = () => {
      codes.push(thrown(() => world.coordinator.transferOwnership({ sender: STRANGER }, STRANGER)).code);
      codes.push(thrown(() => world.coordinator.transferOwnership(owner, STRANGER)).code);
    };

    world.coordinator.initiate(owner, ORIGIN, 1_000n, world.params);

    expect(codes).toEqual(["UNAUTHORIZED", "REENTRANT_CALL"]);
    expect(world.coordinator.owner()).toBe(OWNER);
  });

  it("accepts a new invocation once the previous one has finished", () => {
    const world = setup();
    world.routerB.failSwap = true;
    thrown(() => world.coordinator.initiate(owner, ORIGIN, 1_000n, world.params));
    world.routerB.failSwap = false;

    const outcome = world.coordinator.initiate(owner, ORIGIN, 1_000n, world.params);

    expect(outcome.profit).toBe(10n);
    expect(world.coordinator.lastAttempt?.terminal).toBe("COMPLETED");
  });
});

describe("LoanCoordinator.withdraw", () => {
  it("sends the whole balance to the owner", () => {
    const world = setup();
    world.coordinator.initiate(owner, ORIGIN, 1_000n, world.params);

    const amount = world.coordinator.withdraw(owner, ORIGIN);

    expect(amount).toBe(10n);
    expect(world.ledger.balanceOf(ORIGIN, OWNER)).toBe(10n);
    expect(world.ledger.balanceOf(ORIGIN, COORDINATOR)).toBe(0n);
    expect(world.journal.records()[2]).toEqual({
      type: "FUNDS_WITHDRAWN",
      trace_id: expect.any(String),
      asset: ORIGIN,
      to: OWNER,
      amount: 10n,
      at: NOW,
    });
  });

  it("fails on a zero balance without changing anything", () => {
    const world = setup();
    const before = balances(world);

    const err = thrown(() => world.coordinator.withdraw(owner, MID));

    expect(err.code).toBe("NOTHING_TO_WITHDRAW");
    expect(balances(world)).toEqual(before);
    expect(world.journal.records()).toHaveLength(0);
  });

  it("reports a malformed asset address as invalid input", () => {
    const world = setup();

    const err = thrown(() => world.coordinator.withdraw(owner, "0x1234"));

    expect(err.code).toBe("ENV_INVALID");
  });

  it("is owner only", () => {
    const world = setup();
    world.ledger.mint(ORIGIN, COORDINATOR, 5n);

    const err = thrown(() => world.coordinator.withdraw({ sender: STRANGER }, ORIGIN));

    expect(err.code).toBe("UNAUTHORIZED");
    expect(world.ledger.balanceOf(ORIGIN, COORDINATOR)).toBe(5n);
  });
});

describe("LoanCoordinator ownership", () => {
  it("hands every owner-only operation to the new owner", () => {
    const world = setup();

    world.coordinator.transferOwnership(owner, STRANGER);

    expect(world.coordinator.owner()).toBe(STRANGER);
    expect(world.journal.records()).toEqual([
      {
        type: "OWNERSHIP_TRANSFERRED",
        trace_id: expect.any(String),
        previous_owner: OWNER,
        new_owner: STRANGER,
        at: NOW,
      },
    ]);
    expect(thrown(() => world.coordinator.initiate(owner, ORIGIN, 1_000n, world.params)).code).toBe(
      "UNAUTHORIZED",
    );
    expect(world.coordinator.initiate({ sender: STRANGER }, ORIGIN, 1_000n, world.params).profit).toBe(10n);
  });

  it("refuses the zero address and non-owners", () => {
    const world = setup();

    expect(thrown(() => world.coordinator.transferOwnership(owner, ZERO_ADDRESS)).code).toBe("OWNER_INVALID");
    expect(thrown(() => world.coordinator.transferOwnership({ sender: STRANGER }, STRANGER)).code).toBe(
      "UNAUTHORIZED",
    );
    expect(world.coordinator.owner()).toBe(OWNER);
    expect(world.journal.records()).toHaveLength(0);
  });

  it("exposes its wiring", () => {
    const { coordinator } = setup();

    expect(coordinator.addressesProvider.address).toBe(PROVIDER);
    expect(coordinator.venues.map((v) => v.router_address)).toEqual([ROUTER_A, ROUTER_B]);
    expect(coordinator.address).toBe(COORDINATOR);
  });
});
