import { afterEach, describe, expect, it } from "vitest";
import type { PlaceDetails } from "../../core/ports/inboundPorts";
import { MockPlaceLookup } from "../mocks/mockPlaceLookup";
import { OllamaReasoner } from "./ollamaReasoner";

const originalFetch = globalThis.fetch;

afterEach(() => {
  globalThis.fetch = originalFetch;
});

const harbor: PlaceDetails = {
  id: "place-harbor",
  name: "Harbor Peptides",
  formattedAddress: "400 Oyster Point Blvd, South San Francisco, CA 94080, USA",
  website: "https://harborpeptides.com",
  types: ["point_of_interest"],
  operationalStatus: "operational",
};

const reasoner = (maxRounds = 4): OllamaReasoner =>
  new OllamaReasoner("http://ollama.test", "test-model", {
    regionName: "Test Bay",
    regionCenter: { lat: 37.7749, lng: -122.4194 },
    maxRounds,
    timeoutMs: 500,
  });

const chatReply = (message: unknown): Response =>
  new Response(JSON.stringify({ message }), { status: 200 });

/**
 * Serves scripted chat replies in order and records each request body.
 */
const scriptFetch = (replies: Response[]): unknown[] => {
  const bodies: unknown[] = [];
  let index = 0;
  globalThis.fetch = async (_input, init) => {
    bodies.push(typeof init?.body === "string" ? JSON.parse(init.body) : undefined);
    const reply = replies[index] ?? replies[replies.length - 1];
    index += 1;
    if (!reply) {
      throw new Error("no scripted reply");
    }
    return reply.clone();
  };
  return bodies;
};

const finalAnswer = JSON.stringify({
  company_name: "Harbor Peptides",
  address: harbor.formattedAddress,
  city: "South San Francisco",
  website: "https://harborpeptides.com",
  place_id: "place-harbor",
  confidence: 0.9,
  validation: {
    in_region: true,
    brand_matches: true,
    is_business: true,
    reasoning: "place name and website match",
  },
});

describe("OllamaReasoner", () => {
  it("runs lookup tools until the model answers with JSON", async () => {
    const bodies = scriptFetch([
      chatReply({
        content: "",
        tool_calls: [
          {
            function: {
              name: "search_places",
              arguments: { query: "Harbor Peptides South San Francisco" },
            },
          },
        ],
      }),
      chatReply({
        content: "",
        tool_calls: [
          {
            function: {
              name: "get_place_details",
              arguments: { place_id: "place-harbor" },
            },
          },
        ],
      }),
      chatReply({ content: `Here is the result:\n${finalAnswer}` }),
    ]);

    const result = await reasoner().discover(
      { companyName: "Harbor Peptides", cityHint: "South San Francisco" },
      new MockPlaceLookup([harbor]),
    );

    expect(result.isOk()).toBe(true);
    if (result.isErr()) {
      throw new Error("expected a discovery result");
    }
    expect(result.value).toEqual({
      companyName: "Harbor Peptides",
      address: harbor.formattedAddress,
      city: "South San Francisco",
      website: "https://harborpeptides.com",
      placeId: "place-harbor",
      confidence: 0.9,
      validation: {
        inRegion: true,
        brandMatches: true,
        isBusiness: true,
        reasoning: "place name and website match",
      },
    });
    expect(bodies).toHaveLength(3);
  });

  it("returns tool output to the model as a tool message", async () => {
    const bodies = scriptFetch([
      chatReply({
        content: "",
        tool_calls: [
          {
            function: {
              name: "get_place_details",
              arguments: { place_id: "missing" },
            },
          },
        ],
      }),
      chatReply({ content: finalAnswer }),
    ]);

    await reasoner().discover(
      { companyName: "Harbor Peptides" },
      new MockPlaceLookup([harbor]),
    );

    const second = bodies[1];
    const messages =
      typeof second === "object" && second !== null && "messages" in second
        ? second.messages
        : undefined;
    expect(Array.isArray(messages) ? messages.at(-1) : undefined).toEqual({
      role: "tool",
      content: JSON.stringify({ error: "Unknown place missing" }),
    });
  });

  it("fails with round_limit_exceeded when the model never answers", async () => {
    scriptFetch([
      chatReply({
        content: "",
        tool_calls: [
          {
            function: {
              name: "search_places",
              arguments: { query: "Harbor" },
            },
          },
        ],
      }),
    ]);

    const result = await reasoner(2).discover(
      { companyName: "Harbor Peptides" },
      new MockPlaceLookup([harbor]),
    );

    expect(result.isErr()).toBe(true);
    if (result.isOk()) {
      throw new Error("expected round limit error");
    }
    expect(result.error.code).toBe("round_limit_exceeded");
    expect(result.error.retryable).toBe(false);
    expect(result.error.source).toBe("reasoning");
  });

  it("reports an answer that is not the expected JSON as malformed", async () => {
    scriptFetch([chatReply({ content: "I could not find it." })]);

    const result = await reasoner().discover(
      { companyName: "Harbor Peptides" },
      new MockPlaceLookup([harbor]),
    );

    expect(result.isErr() && result.error.code).toBe("malformed_response");
  });

  it("maps throttling from the model server to rate_limited", async () => {
    scriptFetch([new Response("slow down", { status: 429 })]);

    const result = await reasoner().discover(
      { companyName: "Harbor Peptides" },
      new MockPlaceLookup([harbor]),
    );

    expect(result.isErr()).toBe(true);
    if (result.isOk()) {
      throw new Error("expected rate limit error");
    }
    expect(result.error.code).toBe("rate_limited");
    expect(result.error.retryable).toBe(true);
    expect(result.error.httpStatus).toBe(429);
  });
});
