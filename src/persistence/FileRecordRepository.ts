import { promises as fs } from "node:fs";
import { Holding, Loan, Sale, Stake } from "../models";
import type { PortfolioDocument } from "../schemas/document";
import logger from "../utils/logger";
import { CorruptDocumentError } from "./errors";
import type { RecordRepository } from "./RecordRepository";
import {
  emptyDocument,
  ensureDirectory,
  hasErrorCode,
  parseDocument,
  removeById,
  serializeDocument,
} from "./storeUtils";

/**
 * Keeps holdings, loans, sales and stakes in one JSON document.
 *
 * Nothing is cached: every call reads the whole file, and every change
 * rewrites it in full. There is no locking, so two processes writing the
 * same file can lose each other's updates.
 */
export class FileRecordRepository implements RecordRepository {
  private initialization: Promise<void> | null = null;

  constructor(private readonly filePath: string) {}

  /** Creates an empty document if none exists. An existing file is left untouched. */
  initialize(): Promise<void> {
    this.initialization ??= this.createIfMissing().catch((error: unknown) => {
      this.initialization = null;
      throw error;
    });
    return this.initialization;
  }

  async listHoldings(): Promise<Holding[]> {
    const document = await this.load();
    return (document.holdings ?? []).map((record) => Holding.fromRecord(record));
  }

  async addHolding(holding: Holding): Promise<Holding> {
    const document = await this.load();
    document.holdings = [...(document.holdings ?? []), holding.toRecord()];
    await this.save(document);
    logger.debug({ id: holding.id, coin: holding.coin }, "Holding stored");
    return holding;
  }

  async removeHolding(id: string): Promise<boolean> {
    const document = await this.load();
    const { kept, removed } = removeById(document.holdings ?? [], id);
    if (!removed) {
      return false;
    }

    document.holdings = kept;
    await this.save(document);
    logger.debug({ id, removed }, "Holding removed");
    return true;
  }

  async listLoans(): Promise<Loan[]> {
    const document = await this.load();
    return (document.loans ?? []).map((record) => Loan.fromRecord(record));
  }

  async addLoan(loan: Loan): Promise<Loan> {
    const document = await this.load();
    document.loans = [...(document.loans ?? []), loan.toRecord()];
    await this.save(document);
    logger.debug({ id: loan.id, coin: loan.coin, platform: loan.platform }, "Loan stored");
    return loan;
  }

  async removeLoan(id: string): Promise<boolean> {
    const document = await this.load();
    const { kept, removed } = removeById(document.loans ?? [], id);
    if (!removed) {
      return false;
    }

    document.loans = kept;
    await this.save(document);
    logger.debug({ id, removed }, "Loan removed");
    return true;
  }

  async listSales(): Promise<Sale[]> {
    const document = await this.load();
    return (document.sales ?? []).map((record) => Sale.fromRecord(record));
  }

  async addSale(sale: Sale): Promise<Sale> {
    const document = await this.load();
    document.sales = [...(document.sales ?? []), sale.toRecord()];
    await this.save(document);
    logger.debug({ id: sale.id, coin: sale.coin }, "Sale stored");
    return sale;
  }

  async removeSale(id: string): Promise<boolean> {
    const document = await this.load();
    const { kept, removed } = removeById(document.sales ?? [], id);
    if (!removed) {
      return false;
    }

    document.sales = kept;
    await this.save(document);
    logger.debug({ id, removed }, "Sale removed");
    return true;
  }

  async listStakes(): Promise<Stake[]> {
    const document = await this.load();
    return (document.stakes ?? []).map((record) => Stake.fromRecord(record));
  }

  async addStake(stake: Stake): Promise<Stake> {
    const document = await this.load();
    document.stakes = [...(document.stakes ?? []), stake.toRecord()];
    await this.save(document);
    logger.debug({ id: stake.id, coin: stake.coin, platform: stake.platform }, "Stake stored");
    return stake;
  }

  async removeStake(id: string): Promise<boolean> {
    const document = await this.load();
    const { kept, removed } = removeById(document.stakes ?? [], id);
    if (!removed) {
      return false;
    }

    document.stakes = kept;
    await this.save(document);
    logger.debug({ id, removed }, "Stake removed");
    return true;
  }

  private async createIfMissing(): Promise<void> {
    await ensureDirectory(this.filePath);

    try {
      await fs.writeFile(this.filePath, serializeDocument(emptyDocument()), {
        encoding: "utf-8",
        flag: "wx",
        mode: 0o600,
      });
      logger.debug({ filePath: this.filePath }, "Created empty portfolio document");
    } catch (error) {
      if (!hasErrorCode(error, "EEXIST")) {
        throw error;
      }
    }
  }

  private async load(): Promise<PortfolioDocument> {
    await this.initialize();
    const payload = await fs.readFile(this.filePath, "utf-8");

    try {
      return parseDocument(payload, this.filePath);
    } catch (error) {
      if (error instanceof CorruptDocumentError) {
        logger.error({ err: error, filePath: this.filePath }, "Portfolio document could not be parsed");
      }
      throw error;
    }
  }

  private async save(document: PortfolioDocument): Promise<void> {
    await ensureDirectory(this.filePath);
    await fs.writeFile(this.filePath, serializeDocument(document), "utf-8");
  }
}

export default FileRecordRepository;
