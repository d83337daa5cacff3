import assert from "node:assert/strict";
import { describe, it } from "node:test";
import {
	buildConversation,
	conversationIdFor,
	formatLocalDateTime,
	generateTitle,
	groupIntoConversations,
	summarizeConversation,
} from "../conversation-grouper.js";
import type { Recording } from "../types.js";

function recording(timestamp: number, fields: Partial<Recording> = {}): Recording {
	return {
		timestamp,
		directory: `/recordings/${timestamp}`,
		segments: [],
		createdAt: new Date(timestamp * 1000),
		...fields,
	};
}

describe("conversationIdFor", () => {
	it("uses the content hash when present", () => {
		assert.equal(conversationIdFor({ timestamp: 100, contentHash: "abc" }), "abc");
	});

	it("falls back to the timestamp", () => {
		assert.equal(conversationIdFor({ timestamp: 100 }), "100");
		assert.equal(conversationIdFor({ timestamp: 100, contentHash: "" }), "100");
	});
});

describe("generateTitle", () => {
	it("uses trimmed text up to 50 characters", () => {
		assert.equal(generateTitle(recording(1, { rawTranscription: "  Short note  " })), "Short note");
	});

	it("cuts longer text at 50 characters and appends an ellipsis", () => {
		const text = "a".repeat(49) + "bc";
		assert.equal(generateTitle(recording(1, { rawTranscription: text })), `${"a".repeat(49)}b...`);
	});

	it("keeps exactly 50 characters without an ellipsis", () => {
		const text = "x".repeat(50);
		assert.equal(generateTitle(recording(1, { rawTranscription: text })), text);
	});

	it("counts code points, not UTF-16 units", () => {
		const mic = "\u{1F399}";
		const text = mic.repeat(51);
		assert.equal(generateTitle(recording(1, { rawTranscription: text })), `${mic.repeat(50)}...`);
	});

	it("prefers preprocessed text over raw and LLM text", () => {
		const title = generateTitle(
			recording(1, {
				preprocessedTranscription: "preprocessed",
				rawTranscription: "raw",
				llmTranscription: "llm",
			})
		);
		assert.equal(title, "preprocessed");
	});

	it("falls back to a local date-time", () => {
		const createdAt = new Date(2024, 0, 5, 9, 3, 7);
		assert.equal(
			generateTitle(recording(1, { createdAt, rawTranscription: "   " })),
			"Conversation on 2024-01-05 09:03:07"
		);
	});
});

describe("formatLocalDateTime", () => {
	it("zero-pads every field", () => {
		assert.equal(formatLocalDateTime(new Date(2025, 8, 1, 1, 2, 3)), "2025-09-01 01:02:03");
	});
});

describe("buildConversation", () => {
	it("orders versions newest first and marks only the first as latest", () => {
		const conversation = buildConversation("h1", [
			recording(100, { contentHash: "h1", rawTranscription: "first take" }),
			recording(300, { contentHash: "h1", rawTranscription: "third take" }),
			recording(200, { contentHash: "h1", rawTranscription: "second take" }),
		]);

		assert.deepEqual(
			conversation.versions.map((version) => [version.versionId, version.isLatest]),
			[
				["300", true],
				["200", false],
				["100", false],
			]
		);
		assert.equal(conversation.latestVersion, conversation.versions[0]);
		assert.equal(conversation.title, "third take");
		assert.equal(conversation.createdAt?.getTime(), 100_000);
		assert.equal(conversation.updatedAt?.getTime(), 300_000);
	});
});

describe("groupIntoConversations", () => {
	it("groups recordings that share a content hash", () => {
		const conversations = groupIntoConversations([
			recording(100, { contentHash: "h1" }),
			recording(200, { contentHash: "h2" }),
			recording(300, { contentHash: "h1" }),
		]);

		assert.equal(conversations.length, 2);
		const h1 = conversations.find((conversation) => conversation.conversationId === "h1");
		assert.deepEqual(
			h1?.versions.map((version) => version.timestamp),
			[300, 100]
		);
	});

	it("keeps hashless recordings as their own conversations", () => {
		const conversations = groupIntoConversations([recording(100), recording(200)]);
		assert.deepEqual(
			conversations.map((conversation) => conversation.conversationId),
			["200", "100"]
		);
	});

	it("places every recording in exactly one conversation", () => {
		const input = [
			recording(1, { contentHash: "a" }),
			recording(2, { contentHash: "b" }),
			recording(3, { contentHash: "a" }),
			recording(4),
			recording(5, { contentHash: "b" }),
		];
		const conversations = groupIntoConversations(input);
		const timestamps = conversations
			.flatMap((conversation) => conversation.versions.map((version) => version.timestamp))
			.sort((a, b) => a - b);
		assert.deepEqual(timestamps, [1, 2, 3, 4, 5]);
	});

	it("orders by most recent update, then latest timestamp, then id", () => {
		const sameInstant = new Date(5_000_000);
		const conversations = groupIntoConversations([
			recording(10, { contentHash: "old" }),
			recording(20, { contentHash: "tie-b", createdAt: sameInstant }),
			recording(20, { contentHash: "tie-a", createdAt: sameInstant }),
			recording(30, { contentHash: "newest", createdAt: new Date(9_000_000) }),
		]);
		assert.deepEqual(
			conversations.map((conversation) => conversation.conversationId),
			["newest", "tie-a", "tie-b", "old"]
		);
	});

	it("returns nothing for no recordings", () => {
		assert.deepEqual(groupIntoConversations([]), []);
	});
});

describe("summarizeConversation", () => {
	it("projects list fields", () => {
		const conversation = buildConversation("h1", [
			recording(100, { contentHash: "h1", rawTranscription: "hello there" }),
			recording(200, { contentHash: "h1", rawTranscription: "hello again" }),
		]);
		assert.deepEqual(summarizeConversation(conversation), {
			conversationId: "h1",
			title: "hello again",
			latestTimestamp: 200,
			versionCount: 2,
			createdAt: new Date(100_000),
			updatedAt: new Date(200_000),
		});
	});
});
