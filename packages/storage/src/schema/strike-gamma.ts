/**
 * Strike Gamma Tables
 *
 * option_strike_gamma, plus the name of the per-expiration materialized view
 * built over it in migrations/001_option_strike_gamma.sql
 */
import {
	date,
	doublePrecision,
	index,
	integer,
	numeric,
	pgTable,
	primaryKey,
	text,
	timestamp,
} from "drizzle-orm/pg-core";

// option_strike_gamma: one row per strike per expiration per stored date
export const optionStrikeGamma = pgTable(
	"option_strike_gamma",
	{
		ticker: text("ticker").notNull(),
		tradeDate: date("trade_date", { mode: "string" }).notNull(),
		expirDate: date("expir_date", { mode: "string" }).notNull(),
		dte: integer("dte"),
		strike: numeric("strike", { precision: 14, scale: 4 }).notNull(),
		stockPrice: numeric("stock_price", { precision: 16, scale: 6 }),
		callOi: integer("call_oi"),
		putOi: integer("put_oi"),
		gamma: doublePrecision("gamma"),
		gexCall: doublePrecision("gex_call"),
		gexPut: doublePrecision("gex_put"),
		shortRate: doublePrecision("short_rate"),
		divYield: doublePrecision("div_yield"),
		discountedLevel: doublePrecision("discounted_level"),
		updatedAt: timestamp("updated_at", { withTimezone: true }).notNull().defaultNow(),
	},
	(table) => [
		primaryKey({ columns: [table.ticker, table.tradeDate, table.expirDate, table.strike] }),
		index("idx_option_strike_gamma_trade_date").on(table.tradeDate),
	]
);

export const GEX_BY_EXPIRATION_VIEW = "option_gex_by_expiration";
