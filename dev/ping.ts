import "dotenv/config";
import { executorFromEnv } from "../src/db/index.js";

async function main() {
  const db = executorFromEnv();

  try {
    const row = await db.row("SELECT ? AS ok", [1], { rowType: "Dict" });
    console.log(`Dialect: ${db.dialect}`);
    console.log(row);
    console.log(db.lastSql());
  } finally {
    await db.close();
  }
}

main().catch(err => { console.error(err); process.exit(1); });
