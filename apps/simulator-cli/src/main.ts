import { ALL_GAMES, isGameName } from "@coin-casino/core-types";
import { isCasinoError } from "@coin-casino/core-errors";
import { parseArgs } from "./args";
import { simulate } from "./simulate";

function usage(): void {
  console.error(`Available games: ${ALL_GAMES.join(", ")}`);
  console.error(`Example: npm run simulate -- dice --rounds 10000 --seed 7 --bet 100 --params '{"condition":"under","target":51}'`);
}

function main(): void {
  const [, , game, ...rest] = process.argv;
  if (!game || !isGameName(game)) {
    if (game) console.error(`Unsupported game: ${game}`);
    usage();
    process.exitCode = 1;
    return;
  }

  const args = parseArgs(rest);
  try {
    const report = simulate({
      game,
      rounds: Number(args.rounds ?? 10000),
      seed: Number(args.seed ?? Date.now() % 2147483647),
      bet: BigInt(args.bet ?? "100"),
      params: args.params ? JSON.parse(args.params) : undefined,
      houseEdge: args.houseEdge !== undefined ? Number(args.houseEdge) : undefined,
    });
    console.log(JSON.stringify(report, null, 2));
  } catch (err) {
    const payload = isCasinoError(err)
      ? err.toPayload()
      : { error: "INVALID_ARGUMENTS", message: err instanceof Error ? err.message : String(err) };
    console.error(JSON.stringify(payload, null, 2));
    process.exitCode = 1;
  }
}

main();
