/**
 * Pure rendering of a CorrelationGroup into an AlertPayload.
 */

import { type CorrelationGroup, ScopeKind } from "../correlation/types.js";
import type { Decimal } from "../shared/decimal.js";
import { type AccountId, shortAccount } from "../shared/identifiers.js";
import { formatDuration, formatUtc } from "../shared/time.js";
import { PositionSide, TradeAction, type TradeEvent } from "../snapshot/types.js";
import type { AlertParticipant, AlertPayload } from "./types.js";

export interface FormatOptions {
	/** Display name for an account; the short address when omitted. */
	readonly resolveName?: ((id: AccountId) => string) | undefined;
	/** Emoji for a category key; used by category alerts only. */
	readonly emoji?: ((category: string) => string) | undefined;
}

const DEFAULT_CATEGORY_EMOJI = "📊";
const INSTRUMENT_ICON = "🚨";

const ACTION_EMOJI: Record<TradeAction, string> = {
	[TradeAction.Open]: "🟢",
	[TradeAction.Increase]: "⬆️",
	[TradeAction.Decrease]: "⬇️",
	[TradeAction.Close]: "🔴",
};

/** Direction of the exposure traded; a close reports the side it closed. */
function direction(event: TradeEvent): PositionSide {
	if (event.side !== PositionSide.Flat) return event.side;
	if (event.previousSize.isZero()) return PositionSide.Flat;
	return event.previousSize.isNegative() ? PositionSide.Short : PositionSide.Long;
}

/** `$12,500`: whole units with thousands separators. */
export function formatUsd(value: Decimal): string {
	return `$${value.toFixed(0).replace(/\B(?=(\d{3})+(?!\d))/g, ",")}`;
}

function participantLine(
	event: TradeEvent,
	name: string,
	isTrigger: boolean,
	withInstrument: boolean,
): string {
	const traded = `${event.action} ${direction(event)}`;
	const what = withInstrument ? `${event.instrument} ${traded}` : traded;
	const marker = isTrigger ? " (trigger)" : "";
	return `- ${name}: ${what} ${formatUsd(event.value)}${marker}`;
}

function triggerLine(trigger: TradeEvent, name: string): string {
	const transition = `${trigger.previousSize.toString()} → ${trigger.size.toString()}`;
	return `Trigger: ${ACTION_EMOJI[trigger.action]} ${name} ${trigger.instrument} ${transition}`;
}

export function formatAlert(group: CorrelationGroup, options: FormatOptions = {}): AlertPayload {
	const resolveName = options.resolveName ?? shortAccount;
	const isCategory = group.kind === ScopeKind.Category;
	// Largest first; the stable sort keeps time order among equal values.
	const byValue = [...group.events].sort((a, b) => b.value.cmp(a.value));

	const icon = isCategory
		? (options.emoji?.(group.scopeKey) ?? DEFAULT_CATEGORY_EMOJI)
		: INSTRUMENT_ICON;
	const title = isCategory
		? `${icon} Theme confluence: ${group.scopeKey}`
		: `${icon} Confluence: ${group.scopeKey}`;

	const lines = [title, `Accounts: ${group.participantCount} (threshold ${group.threshold})`];
	if (isCategory) lines.push(`Instruments: ${group.instruments.join(", ")}`);

	const participants: AlertParticipant[] = [];
	for (const event of byValue) {
		const name = resolveName(event.accountId);
		const isTrigger = event === group.trigger;
		participants.push({
			accountId: event.accountId,
			name,
			instrument: event.instrument,
			action: event.action,
			side: direction(event),
			sizeDelta: event.sizeDelta.toString(),
			previousSize: event.previousSize.toString(),
			size: event.size.toString(),
			value: event.value.toString(),
			isTrigger,
		});
		lines.push(participantLine(event, name, isTrigger, isCategory));
	}
	lines.push(
		triggerLine(group.trigger, resolveName(group.trigger.accountId)),
		`Total value: ${formatUsd(group.totalValue)}`,
		`Window: ${formatDuration(group.windowMs)}`,
		`Detected: ${formatUtc(group.windowEnd)}`,
	);

	return {
		kind: group.kind,
		scopeKey: group.scopeKey,
		title,
		text: lines.join("\n"),
		participants,
		totalValue: group.totalValue.toString(),
		createdAt: group.detectedAt,
	};
}
