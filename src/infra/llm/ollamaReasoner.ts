import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import type { AppBoundaryError } from "../../core/entities/appError";
import type { LatLng } from "../../core/entities/company";
import type {
  DiscoveryRequest,
  DiscoveryResult,
  PlaceLookupPort,
  ReasoningPort,
} from "../../core/ports/inboundPorts";
import { HttpJsonClient, type HttpClientError } from "../http/httpJsonClient";

type ToolCall = {
  function: { name: string; arguments: Record<string, unknown> };
};

type ChatMessage = {
  role: "system" | "user" | "assistant" | "tool";
  content: string;
  tool_calls?: ToolCall[];
};

const chatResponseSchema = z.object({
  message: z.object({
    content: z.string().default(""),
    tool_calls: z
      .array(
        z.object({
          function: z.object({
            name: z.string(),
            arguments: z.record(z.unknown()).default({}),
          }),
        }),
      )
      .optional(),
  }),
});

const searchArgsSchema = z.object({
  query: z.string().min(1),
  location_bias: z.string().optional(),
});

const detailsArgsSchema = z.object({
  place_id: z.string().min(1),
});

const discoverySchema = z.object({
  company_name: z.string(),
  address: z.string().nullish(),
  city: z.string().nullish(),
  website: z.string().nullish(),
  place_id: z.string().nullish(),
  confidence: z.coerce.number().min(0).max(1),
  validation: z.object({
    in_region: z.boolean(),
    brand_matches: z.boolean(),
    is_business: z.boolean(),
    reasoning: z.string().default(""),
  }),
});

const TOOLS = [
  {
    type: "function",
    function: {
      name: "search_places",
      description:
        "Text search for places. Returns candidates with id, name, address and types.",
      parameters: {
        type: "object",
        properties: {
          query: { type: "string", description: "Company name plus city" },
          location_bias: {
            type: "string",
            description: "Optional 'lat,lng' to bias results",
          },
        },
        required: ["query"],
      },
    },
  },
  {
    type: "function",
    function: {
      name: "get_place_details",
      description:
        "Details for a place id: name, formatted address, website, types, business status.",
      parameters: {
        type: "object",
        properties: { place_id: { type: "string" } },
        required: ["place_id"],
      },
    },
  },
] as const;

export type OllamaReasonerOptions = {
  regionName: string;
  regionCenter: LatLng;
  maxRounds: number;
  timeoutMs: number;
};

const systemPrompt = (regionName: string): string =>
  [
    `You locate the physical office of biotech companies in the ${regionName}.`,
    "Use search_places and get_place_details to find the company's own headquarters.",
    "Rules:",
    "- The address must be inside the region; a same-named company elsewhere is not a match.",
    "- The place name or website must clearly belong to the company brand.",
    "- Reject residential addresses, hotels, parking, storage, virtual offices and closed businesses.",
    "- Shared incubator buildings (QB3, BioHub, Gateway Blvd, Mission Bay) need confidence of at least 0.85.",
    "- Never invent an address; when unsure set confidence below 0.5.",
    "Answer with a single JSON object and nothing else:",
    '{"company_name": string, "address": string|null, "city": string|null, "website": string|null,',
    ' "place_id": string|null, "confidence": number between 0 and 1,',
    ' "validation": {"in_region": boolean, "brand_matches": boolean, "is_business": boolean, "reasoning": string}}',
  ].join("\n");

const extractJsonObject = (content: string): unknown => {
  const start = content.indexOf("{");
  const end = content.lastIndexOf("}");
  if (start < 0 || end <= start) {
    return undefined;
  }
  try {
    return JSON.parse(content.slice(start, end + 1));
  } catch {
    return undefined;
  }
};

const parseLatLng = (raw: string | undefined): LatLng | undefined => {
  const [lat, lng] = (raw ?? "").split(",").map((part) => Number(part.trim()));
  return lat !== undefined &&
    lng !== undefined &&
    Number.isFinite(lat) &&
    Number.isFinite(lng)
    ? { lat, lng }
    : undefined;
};

/**
 * Guided discovery through an Ollama chat model that calls the lookup as tools.
 */
export class OllamaReasoner implements ReasoningPort {
  constructor(
    private readonly baseUrl: string,
    private readonly model: string,
    private readonly options: OllamaReasonerOptions,
    private readonly httpClient = new HttpJsonClient(),
  ) {}

  async discover(
    request: DiscoveryRequest,
    lookup: PlaceLookupPort,
  ): Promise<Result<DiscoveryResult, AppBoundaryError>> {
    const messages: ChatMessage[] = [
      { role: "system", content: systemPrompt(this.options.regionName) },
      {
        role: "user",
        content: request.cityHint
          ? `Company: ${request.companyName}\nCity hint: ${request.cityHint}`
          : `Company: ${request.companyName}`,
      },
    ];

    for (let round = 0; round < this.options.maxRounds; round += 1) {
      const reply = await this.chat(messages);
      if (reply.isErr()) {
        return err(reply.error);
      }

      const toolCalls = reply.value.tool_calls ?? [];
      if (toolCalls.length === 0) {
        return this.parseDiscovery(reply.value.content);
      }

      messages.push({
        role: "assistant",
        content: reply.value.content,
        tool_calls: toolCalls,
      });
      for (const call of toolCalls) {
        messages.push({
          role: "tool",
          content: JSON.stringify(await this.runTool(call, lookup)),
        });
      }
    }

    return err({
      source: "reasoning",
      code: "round_limit_exceeded",
      provider: "ollama",
      message: `No answer within ${this.options.maxRounds} tool rounds.`,
      retryable: false,
    });
  }

  private async runTool(
    call: ToolCall,
    lookup: PlaceLookupPort,
  ): Promise<unknown> {
    if (call.function.name === "search_places") {
      const args = searchArgsSchema.safeParse(call.function.arguments);
      if (!args.success) {
        return { error: "search_places requires a query string" };
      }
      const result = await lookup.search(
        args.data.query,
        parseLatLng(args.data.location_bias) ?? this.options.regionCenter,
      );
      return result.isOk()
        ? { candidates: result.value }
        : { error: result.error.message };
    }

    if (call.function.name === "get_place_details") {
      const args = detailsArgsSchema.safeParse(call.function.arguments);
      if (!args.success) {
        return { error: "get_place_details requires a place_id string" };
      }
      const result = await lookup.details(args.data.place_id);
      return result.isOk()
        ? { details: result.value }
        : { error: result.error.message };
    }

    return { error: `unknown tool ${call.function.name}` };
  }

  private parseDiscovery(
    content: string,
  ): Result<DiscoveryResult, AppBoundaryError> {
    const parsed = discoverySchema.safeParse(extractJsonObject(content));
    if (!parsed.success) {
      return err({
        source: "reasoning",
        code: "malformed_response",
        provider: "ollama",
        message: "Discovery answer did not match the expected JSON shape.",
        retryable: true,
        cause: parsed.error.issues,
      });
    }

    const answer = parsed.data;
    return ok({
      companyName: answer.company_name,
      address: answer.address ?? undefined,
      city: answer.city ?? undefined,
      website: answer.website ?? undefined,
      placeId: answer.place_id ?? undefined,
      confidence: answer.confidence,
      validation: {
        inRegion: answer.validation.in_region,
        brandMatches: answer.validation.brand_matches,
        isBusiness: answer.validation.is_business,
        reasoning: answer.validation.reasoning,
      },
    });
  }

  private async chat(
    messages: ChatMessage[],
  ): Promise<Result<z.infer<typeof chatResponseSchema>["message"], AppBoundaryError>> {
    const response = await this.httpClient.requestJson({
      url: `${this.baseUrl}/api/chat`,
      method: "POST",
      headers: { "content-type": "application/json" },
      body: {
        model: this.model,
        stream: false,
        messages,
        tools: TOOLS,
        options: { temperature: 0 },
      },
      timeoutMs: this.options.timeoutMs,
    });

    if (response.isErr()) {
      return err({
        source: "reasoning",
        code: this.mapHttpCode(response.error),
        provider: "ollama",
        message: response.error.message,
        retryable: response.error.retryable,
        httpStatus: response.error.httpStatus,
        cause: response.error.cause,
      });
    }

    const parsed = chatResponseSchema.safeParse(response.value);
    if (!parsed.success) {
      return err({
        source: "reasoning",
        code: "malformed_response",
        provider: "ollama",
        message: "Ollama chat payload did not contain a message.",
        retryable: true,
        cause: parsed.error.issues,
      });
    }

    return ok(parsed.data.message);
  }

  private mapHttpCode(error: HttpClientError): AppBoundaryError["code"] {
    if (error.httpStatus === 429) {
      return "rate_limited";
    }

    if (error.httpStatus === 401 || error.httpStatus === 403) {
      return "auth_invalid";
    }

    if (error.code === "timeout" || error.code === "invalid_json") {
      return error.code;
    }

    return error.code === "transport_error" ? "transport_error" : "provider_error";
  }
}
