import assert from "node:assert/strict";
import { describe, it } from "node:test";
import { extractMatchContexts, findConversationMatches } from "../match-context.js";
import type { Conversation, ConversationVersion, Recording } from "../types.js";

function version(timestamp: number, fields: Partial<Recording>): ConversationVersion {
	return {
		versionId: String(timestamp),
		timestamp,
		recording: { timestamp, directory: `/r/${timestamp}`, segments: [], createdAt: new Date(0), ...fields },
		isLatest: false,
	};
}

function conversation(title: string, versions: ConversationVersion[]): Conversation {
	return { conversationId: "abc", title, versions, latestVersion: versions[0] };
}

describe("extractMatchContexts", () => {
	it("keeps the whole text when it fits the window", () => {
		assert.deepEqual(extractMatchContexts("short note", "NOTE"), ["short note"]);
	});

	it("marks cut ends with an ellipsis", () => {
		assert.deepEqual(extractMatchContexts("alpha beta gamma", "BETA", 3), ["...ha beta ga..."]);
	});

	it("finds each occurrence up to the limit", () => {
		const contexts = extractMatchContexts("x x x x x x x", "x", 0);
		assert.equal(contexts.length, 5);
		assert.deepEqual(contexts.slice(0, 2), ["x...", "...x..."]);
	});

	it("returns nothing without a match or a query", () => {
		assert.deepEqual(extractMatchContexts("alpha", "omega"), []);
		assert.deepEqual(extractMatchContexts("alpha", ""), []);
	});
});

describe("findConversationMatches", () => {
	it("labels title and text stages, newest version first", () => {
		const found = conversation("Budget plans", [
			version(200, {
				rawTranscription: "the budget is tight",
				preprocessedTranscription: "The budget is tight.",
			}),
			version(100, { llmTranscription: "no budget talk", rawTranscription: "nothing here" }),
		]);

		assert.deepEqual(findConversationMatches(found, "BUDGET"), [
			"Title: Budget plans",
			"Raw: the budget is tight",
			"Preprocessed: The budget is tight.",
			"LLM: no budget talk",
		]);
	});

	it("caps the matches per conversation", () => {
		const text = "b b b b b b";
		const found = conversation("Untitled", [
			version(100, {
				rawTranscription: text,
				preprocessedTranscription: text,
				llmTranscription: text,
			}),
		]);

		const matches = findConversationMatches(found, "b");
		assert.equal(matches.length, 10);
		assert.equal(matches[4], "Raw: b b b b b b");
		assert.equal(matches[9], "Preprocessed: b b b b b b");
	});

	it("returns nothing when no field matches", () => {
		const found = conversation("Groceries", [version(100, { rawTranscription: "apples" })]);
		assert.deepEqual(findConversationMatches(found, "budget"), []);
	});
});
