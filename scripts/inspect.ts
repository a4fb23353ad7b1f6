import env from "../src/config/env";
import validateEnvironment from "../src/config/validateEnv";
import { createPortfolio, createSnapshotRepository } from "../src";

const main = async () => {
  validateEnvironment(env);
  const portfolio = createPortfolio();

  console.log("document", env.dataPath);
  console.log("holdings", await portfolio.listHoldings());
  console.log("loans", await portfolio.listLoans());
  console.log("sales", await portfolio.listSales());
  console.log("stakes", await portfolio.listStakes());
  console.log("summary", await portfolio.getExtendedSummary());

  const [latest] = await createSnapshotRepository().list();
  console.log("latest snapshot", latest ?? "none");
};

main().catch((error) => {
  console.error(error);
  process.exit(1);
});
