import assert from "node:assert/strict";
import { afterEach, beforeEach, describe, it } from "node:test";
import { promises as fs } from "node:fs";
import os from "node:os";
import path from "node:path";
import { FileRecordRepository } from "../persistence/FileRecordRepository";
import { createPortfolio } from "../index";
import { MissingPricesError } from "./errors";
import PortfolioService from "./PortfolioService";

let testDir: string;
let storePath: string;
let service: PortfolioService;

const seedExamplePortfolio = async () => {
  await service.addHolding({ coin: "BTC", amount: 1.5, purchasePriceUsd: 20000 });
  await service.addHolding({ coin: "ETH", amount: 10, purchasePriceUsd: 1500 });
  await service.addLoan({ coin: "BTC", amount: 0.5, platform: "Nexo" });
};

describe("PortfolioService", () => {
  beforeEach(async () => {
    testDir = await fs.mkdtemp(path.join(os.tmpdir(), "coin-ledger-service-"));
    storePath = path.join(testDir, "portfolio.json");
    service = new PortfolioService(new FileRecordRepository(storePath));
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  describe("records", () => {
    it("upper-cases the coin of added holdings", async () => {
      const holding = await service.addHolding({ coin: "btc", amount: 0.25, purchasePriceUsd: 40000, platform: "Binance" });

      assert.equal(holding.coin, "BTC");
      const [stored] = await service.listHoldings();
      assert.equal(stored.coin, "BTC");
      assert.equal(stored.platform, "Binance");
    });

    it("assigns distinct ids across many holdings", async () => {
      const ids = new Set<string>();
      for (let index = 0; index < 1000; index += 1) {
        const holding = await service.addHolding({ coin: "btc", amount: 0.001, purchasePriceUsd: 1 });
        ids.add(holding.id);
      }

      assert.equal(ids.size, 1000);
      assert.equal((await service.listHoldings()).length, 1000);
    });

    it("lists loans and sales in insertion order", async () => {
      const first = await service.addLoan({ coin: "usdt", amount: 1000, platform: "Nexo", interestRate: 12 });
      const second = await service.addLoan({ coin: "btc", amount: 0.2, platform: "Ledn" });
      const sale = await service.addSale({ coin: "eth", amount: 1, sellPriceUsd: 3000, notes: "rebalance" });

      assert.deepEqual(
        (await service.listLoans()).map((loan) => loan.id),
        [first.id, second.id],
      );
      assert.deepStrictEqual(await service.listSales(), [sale]);
    });

    it("reports whether a removal happened", async () => {
      const holding = await service.addHolding({ coin: "eth", amount: 1, purchasePriceUsd: 1 });
      const loan = await service.addLoan({ coin: "eth", amount: 1, platform: "Aave" });
      const sale = await service.addSale({ coin: "eth", amount: 1, sellPriceUsd: 1 });

      assert.equal(await service.removeHolding("missing1"), false);
      assert.equal((await service.listHoldings()).length, 1);

      assert.equal(await service.removeHolding(holding.id), true);
      assert.equal(await service.removeLoan(loan.id), true);
      assert.equal(await service.removeSale(sale.id), true);
      assert.equal(await service.removeSale(sale.id), false);

      assert.deepEqual(await service.listHoldings(), []);
      assert.deepEqual(await service.listLoans(), []);
      assert.deepEqual(await service.listSales(), []);
    });

    it("is wired to the given data path by createPortfolio", async () => {
      const holding = await createPortfolio({ dataPath: storePath }).addHolding({
        coin: "xrp",
        amount: 250,
        purchasePriceUsd: 0.5,
      });

      assert.deepStrictEqual(await service.listHoldings(), [holding]);
      assert.equal((await service.getHoldingsByCoin()).XRP, 250);
    });

    it("sees records added through another instance", async () => {
      const holding = await service.addHolding({ coin: "ada", amount: 500, purchasePriceUsd: 0.3 });

      const other = new PortfolioService(new FileRecordRepository(storePath));
      assert.deepStrictEqual(await other.listHoldings(), [holding]);
    });
  });

  describe("aggregation", () => {
    it("groups amounts by coin and nets loans against holdings", async () => {
      await seedExamplePortfolio();

      assert.deepEqual(await service.getHoldingsByCoin(), { BTC: 1.5, ETH: 10 });
      assert.deepEqual(await service.getLoansByCoin(), { BTC: 0.5 });
      assert.deepEqual(await service.getNetHoldingsByCoin(), { BTC: 1, ETH: 10 });
      assert.equal(await service.getTotalInvestedUsd(), 45000);
    });

    it("sums repeated purchases of the same coin", async () => {
      await service.addHolding({ coin: "btc", amount: 0.25, purchasePriceUsd: 16000 });
      await service.addHolding({ coin: "BTC", amount: 0.5, purchasePriceUsd: 30000 });

      assert.deepEqual(await service.getHoldingsByCoin(), { BTC: 0.75 });
      assert.equal(await service.getTotalInvestedUsd(), 19000);
    });

    it("includes coins that only appear as loans", async () => {
      await service.addHolding({ coin: "eth", amount: 2, purchasePriceUsd: 1000 });
      await service.addLoan({ coin: "usdt", amount: 500, platform: "Nexo" });

      assert.deepEqual(await service.getNetHoldingsByCoin(), { ETH: 2, USDT: -500 });
    });

    it("returns empty totals for an empty portfolio", async () => {
      assert.deepEqual(await service.getHoldingsByCoin(), {});
      assert.deepEqual(await service.getNetHoldingsByCoin(), {});
      assert.equal(await service.getTotalInvestedUsd(), 0);
    });

    it("leaves net holdings and invested total untouched by sales", async () => {
      await seedExamplePortfolio();
      const netBefore = await service.getNetHoldingsByCoin();
      const investedBefore = await service.getTotalInvestedUsd();

      await service.addSale({ coin: "btc", amount: 1, sellPriceUsd: 60000 });
      await service.addSale({ coin: "doge", amount: 1000, sellPriceUsd: 0.1 });

      assert.deepEqual(await service.getNetHoldingsByCoin(), netBefore);
      assert.equal(await service.getTotalInvestedUsd(), investedBefore);
    });

    it("tracks sales separately", async () => {
      await seedExamplePortfolio();
      await service.addSale({ coin: "eth", amount: 4, sellPriceUsd: 2000 });
      await service.addSale({ coin: "sol", amount: 3, sellPriceUsd: 150 });

      assert.deepEqual(await service.getSalesByCoin(), { ETH: 4, SOL: 3 });
      assert.equal(await service.getTotalSoldUsd(), 8450);
      assert.deepEqual(await service.getCurrentHoldingsByCoin(), { BTC: 1.5, ETH: 6, SOL: -3 });
    });
  });

  describe("summaries", () => {
    it("bundles counts and aggregates without sales figures", async () => {
      await seedExamplePortfolio();
      await service.addSale({ coin: "eth", amount: 4, sellPriceUsd: 2000 });

      const summary = await service.getSummary();

      assert.deepEqual(summary, {
        totalHoldingsCount: 2,
        totalLoansCount: 1,
        totalInvestedUsd: 45000,
        holdingsByCoin: { BTC: 1.5, ETH: 10 },
        loansByCoin: { BTC: 0.5 },
        netByCoin: { BTC: 1, ETH: 10 },
      });
      assert.equal("totalSalesCount" in summary, false);
    });

    it("adds sales figures in the extended summary", async () => {
      await seedExamplePortfolio();
      await service.addSale({ coin: "eth", amount: 4, sellPriceUsd: 2000 });

      assert.deepEqual(await service.getExtendedSummary(), {
        totalHoldingsCount: 2,
        totalLoansCount: 1,
        totalInvestedUsd: 45000,
        holdingsByCoin: { BTC: 1.5, ETH: 10 },
        loansByCoin: { BTC: 0.5 },
        netByCoin: { BTC: 1, ETH: 10 },
        totalSalesCount: 1,
        totalSoldUsd: 8000,
        salesByCoin: { ETH: 4 },
        currentByCoin: { BTC: 1.5, ETH: 6 },
        totalStakesCount: 0,
        stakesByCoin: {},
        availableByCoin: { BTC: 1.5, ETH: 6 },
      });
    });

    it("carries stakes into the extended summary only", async () => {
      await seedExamplePortfolio();
      await service.addStake({ coin: "eth", amount: 5, platform: "Lido" });

      const summary = await service.getSummary();
      const extended = await service.getExtendedSummary();

      assert.equal("totalStakesCount" in summary, false);
      assert.equal(extended.totalStakesCount, 1);
      assert.deepEqual(extended.stakesByCoin, { ETH: 5 });
      assert.deepEqual(extended.availableByCoin, { BTC: 1.5, ETH: 5 });
    });

    it("keeps working when a stored amount is not a number", async () => {
      await service.addHolding({ coin: "btc", amount: Number("abc"), purchasePriceUsd: 100 });

      const summary = await service.getSummary();

      assert.equal(summary.totalHoldingsCount, 1);
      assert.ok(Number.isNaN(summary.totalInvestedUsd));
      assert.ok(Number.isNaN(summary.holdingsByCoin.BTC));
    });
  });

  describe("stakes", () => {
    it("adds, lists and removes stakes", async () => {
      const first = await service.addStake({ coin: "eth", amount: 4, platform: "Lido", apy: 3.1 });
      const second = await service.addStake({ coin: "dot", amount: 120, platform: "Kraken" });

      assert.equal(first.coin, "ETH");
      assert.deepStrictEqual(await service.listStakes(), [first, second]);
      assert.equal(await service.removeStake(first.id), true);
      assert.equal(await service.removeStake(first.id), false);
      assert.deepStrictEqual(await service.listStakes(), [second]);
    });

    it("subtracts stakes from current holdings to give what is available", async () => {
      await seedExamplePortfolio();
      await service.addSale({ coin: "eth", amount: 4, sellPriceUsd: 2000 });
      await service.addStake({ coin: "eth", amount: 5, platform: "Lido" });
      await service.addStake({ coin: "btc", amount: 0.5, platform: "Kraken" });

      assert.deepEqual(await service.getStakesByCoin(), { ETH: 5, BTC: 0.5 });
      assert.deepEqual(await service.getAvailableByCoin(), { BTC: 1, ETH: 1 });
    });

    it("accepts stakes larger than what is held", async () => {
      await service.addStake({ coin: "sol", amount: 3, platform: "Marinade" });

      assert.deepEqual(await service.getAvailableByCoin(), { SOL: -3 });
    });
  });

  describe("snapshots", () => {
    it("values current holdings and loans at the given prices", async () => {
      await seedExamplePortfolio();
      await service.addSale({ coin: "eth", amount: 4, sellPriceUsd: 2000 });
      const timestamp = new Date("2024-06-30T18:00:00.000Z");

      const snapshot = await service.createSnapshot({ btc: 30000, ETH: 2000 }, { note: "quarter end", timestamp });

      assert.match(snapshot.id, /^[0-9a-f]{8}$/);
      assert.equal(snapshot.timestamp, timestamp);
      assert.equal(snapshot.note, "quarter end");
      assert.deepEqual(snapshot.coinValues, {
        BTC: { amount: 1.5, price: 30000, value: 45000 },
        ETH: { amount: 6, price: 2000, value: 12000 },
      });
      assert.equal(snapshot.holdingsValue, 57000);
      assert.equal(snapshot.loansValue, 15000);
      assert.equal(snapshot.netValue, 42000);
      assert.equal(snapshot.totalInvested, 45000);
      assert.equal(snapshot.totalSold, 8000);
      assert.equal(snapshot.profitLoss, 5000);
      assert.equal(snapshot.profitPercent, (5000 / 45000) * 100);
    });

    it("names every held or borrowed coin without a price", async () => {
      await seedExamplePortfolio();
      await service.addLoan({ coin: "usdt", amount: 1000, platform: "Nexo" });

      await assert.rejects(service.createSnapshot({ BTC: 30000 }), (error: unknown) => {
        assert.ok(error instanceof MissingPricesError);
        assert.deepEqual(error.coins, ["ETH", "USDT"]);
        assert.equal(error.message, "Missing prices for coins: ETH, USDT");
        return true;
      });
    });

    it("values an empty portfolio at zero", async () => {
      const snapshot = await service.createSnapshot({});

      assert.equal(snapshot.netValue, 0);
      assert.equal(snapshot.profitLoss, 0);
      assert.equal(snapshot.profitPercent, 0);
      assert.equal(snapshot.note, undefined);
      assert.deepEqual(snapshot.coinValues, {});
    });

    it("does not value staked coins separately", async () => {
      await service.addHolding({ coin: "eth", amount: 10, purchasePriceUsd: 1000 });
      await service.addStake({ coin: "eth", amount: 8, platform: "Lido" });

      const snapshot = await service.createSnapshot({ ETH: 1500 });

      assert.equal(snapshot.holdingsValue, 15000);
      assert.equal(snapshot.profitLoss, 5000);
      assert.equal(snapshot.profitPercent, 50);
    });
  });
});
