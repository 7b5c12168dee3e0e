// ══════════════════════════════════════════════════════════════════════════════
//  Demo
// ══════════════════════════════════════════════════════════════════════════════

import chalk from "chalk";
import { EXIT_SCREEN, Selector, Session, StaticValues, entry } from "../src";

const values = new StaticValues([
    {
        name: "Tables",
        entries: [
            entry("users", "registered accounts"),
            entry("orders", "one row per checkout"),
            entry("order_items", "line items of each order"),
            entry("products", "catalogue"),
            entry("audit_log", "append-only change history"),
        ],
    },
    {
        name: "Columns",
        entries: [
            entry("id", "primary key"),
            entry("email", "users.email, unique"),
            entry("created_at", "insertion timestamp"),
            entry("total", "orders.total, in cents"),
            entry("status"),
        ],
    },
    {
        name: "Keywords",
        entries: [
            entry("SELECT"),
            entry("FROM"),
            entry("WHERE"),
            entry("GROUP BY"),
            entry("ORDER BY"),
            entry("LIMIT"),
            entry("JOIN"),
        ],
    },
]);

const selector = new Selector();
selector.setValues(values);
selector.setWidth(Math.min(process.stdout.columns || 80, 72));

const session = new Session(selector, { row: 2, col: 2 });

process.stdout.on("resize", () => {
    session.resize(Math.min(process.stdout.columns, 72), process.stdout.rows);
});
process.once("SIGTERM", () => {
    process.stdout.write(EXIT_SCREEN);
    process.exit(0);
});

session
    .start()
    .then((result) => {
        if (result.status === "accepted") {
            console.log(chalk.green("accepted ") + chalk.white(result.entry.title));
        } else {
            console.log(chalk.gray("cancelled"));
        }
    })
    .catch((err: unknown) => {
        console.error(err);
        process.exitCode = 1;
    });
