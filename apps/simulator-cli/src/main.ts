import "reflect-metadata";
import { generateServerSeed } from "@lotto-stake/core-randomness";
import { formatTokenUnits } from "@lotto-stake/core-types";
import { runLotterySimulation } from "./simulate";

function main() {
  const args = parseArgs(process.argv.slice(2));
  if (args.help) {
    console.error("Usage: npm run simulate -- --rounds 52 --players 20 --bet 10 --giftReserve 5000 [--seed abc] [--houseEdgeBps 500]");
    process.exit(1);
  }

  const result = runLotterySimulation({
    rounds: Number(args.rounds ?? 52),
    players: Number(args.players ?? 20),
    bet: Number(args.bet ?? 10),
    giftReserve: Number(args.giftReserve ?? 5_000),
    seed: args.seed ?? generateServerSeed(),
    houseEdgeBps: args.houseEdgeBps ? Number(args.houseEdgeBps) : undefined,
  });

  console.log(
    JSON.stringify(
      {
        ...result,
        totalBet: formatTokenUnits(result.totalBet),
        totalPayout: formatTokenUnits(result.totalPayout),
        giftsPaid: formatTokenUnits(result.giftsPaid),
      },
      null,
      2
    )
  );
}

function parseArgs(args: string[]): Record<string, string> {
  const result: Record<string, string> = {};
  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg.startsWith("--")) {
      const key = arg.replace(/^--/, "");
      const value = args[i + 1];
      if (value && !value.startsWith("--")) {
        result[key] = value;
        i++;
      } else {
        result[key] = "true";
      }
    }
  }
  return result;
}

try {
  main();
} catch (err) {
  console.error(err);
  process.exit(1);
}
