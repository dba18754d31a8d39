// OpenAPI 3.0 document for the account assessment API

const servers = [{ url: "http://localhost:4000/api", description: "Local assessment API" }];

const accountIdsBody = {
  required: true,
  content: {
    "application/json": {
      schema: {
        type: "object",
        required: ["accountIds"],
        properties: { accountIds: { type: "array", items: { type: "string" }, example: ["001000000000001AAA"] } },
      },
    },
  },
};

const queryBody = (maxKey: string) => ({
  required: true,
  content: {
    "application/json": {
      schema: {
        type: "object",
        required: ["query"],
        properties: {
          query: { type: "string", example: "SELECT Id FROM Account WHERE Name LIKE 'Acme%'" },
          [maxKey]: { type: "integer", minimum: 1, default: 100 },
        },
      },
    },
  },
});

const jsonResponse = (description: string, ref: string) => ({
  description,
  content: { "application/json": { schema: { $ref: `#/components/schemas/${ref}` } } },
});

const errors = {
  "400": jsonResponse("Invalid request", "ErrorResponse"),
  "500": jsonResponse("Record source or judge failure", "ErrorResponse"),
};

export const openapiSpec = {
  openapi: "3.0.3",
  info: {
    title: "Shell Account Assessment API",
    version: "1.0.0",
    description:
      "Scores how plausibly a customer account belongs under its parent (shell) account, and flags accounts carrying bad email or website domains.",
  },
  servers,
  tags: [
    { name: "Accounts", description: "Account analysis, id validation and query-driven batches" },
    { name: "Domains", description: "Bad domain lookups" },
  ],
  paths: {
    "/accounts/{id}": {
      get: {
        tags: ["Accounts"],
        summary: "Analyze one account",
        parameters: [{ in: "path", name: "id", required: true, schema: { type: "string", minLength: 15, maxLength: 18 } }],
        responses: {
          "200": jsonResponse("Analysis of the account", "AnalyzeResponse"),
          "404": jsonResponse("Account not found", "ErrorResponse"),
          ...errors,
        },
      },
    },
    "/accounts/analyze": {
      post: {
        tags: ["Accounts"],
        summary: "Analyze a batch of accounts",
        description: "Invalid, missing and unfetchable ids are reported in the summary; results keep the order of the request.",
        requestBody: accountIdsBody,
        responses: { "200": jsonResponse("Batch analysis", "AnalyzeResponse"), ...errors },
      },
    },
    "/accounts/validate": {
      post: {
        tags: ["Accounts"],
        summary: "Validate account ids",
        description: "Checks id format, prefix and existence in the record source.",
        requestBody: accountIdsBody,
        responses: { "200": jsonResponse("Validation result", "ValidateResponse"), ...errors },
      },
    },
    "/accounts/query-ids": {
      post: {
        tags: ["Accounts"],
        summary: "Resolve account ids from a SOQL query",
        description: "Only `SELECT Id FROM Account ...` queries are accepted. The LIMIT is capped at maxIds.",
        requestBody: queryBody("maxIds"),
        responses: { "200": jsonResponse("Matching ids", "QueryIdsResponse"), ...errors },
      },
    },
    "/accounts/analyze-query": {
      post: {
        tags: ["Accounts"],
        summary: "Analyze the accounts a SOQL query returns",
        requestBody: queryBody("maxAnalyze"),
        responses: { "200": jsonResponse("Batch analysis with query info", "AnalyzeResponse"), ...errors },
      },
    },
    "/bad-domains/check": {
      get: {
        tags: ["Domains"],
        summary: "Check an email or URL against the bad domain list",
        parameters: [{ in: "query", name: "value", required: true, schema: { type: "string" } }],
        responses: { "200": jsonResponse("Domain check", "DomainCheckResponse"), "400": errors["400"] },
      },
    },
  },
  components: {
    schemas: {
      ErrorResponse: {
        type: "object",
        properties: { status: { type: "string", enum: ["error"] }, message: { type: "string" } },
      },
      Consistency: {
        type: "object",
        properties: { score: { type: "number" }, explanation: { type: "array", items: { type: "string" } } },
      },
      Flags: {
        type: "object",
        properties: {
          Bad_Domain: {
            type: "object",
            properties: {
              isBad: { type: "boolean" },
              explanation: { type: "array", items: { type: "string" } },
              matches: {
                type: "array",
                items: { type: "object", properties: { field: { type: "string" }, domain: { type: "string" } } },
              },
            },
          },
          Has_Shell: { type: "boolean" },
          Customer_Consistency: { $ref: "#/components/schemas/Consistency" },
          Customer_Shell_Coherence: { $ref: "#/components/schemas/Consistency" },
          Address_Consistency: {
            type: "object",
            properties: {
              isConsistent: { type: "boolean" },
              explanation: { type: "array", items: { type: "string" } },
              customerSource: { type: "string", enum: ["Billing_Address", "Enriched_Address"] },
              shellSource: { type: "string", enum: ["Billing_Address", "Enriched_Address"] },
            },
          },
        },
      },
      Assessment: {
        type: "object",
        properties: {
          success: { type: "boolean" },
          confidence_score: { type: "integer", minimum: 0, maximum: 100 },
          explanation_bullets: { type: "array", items: { type: "string" } },
          source: { type: "string", enum: ["ai", "computed", "error"] },
          error: { type: "string" },
        },
      },
      AccountAnalysis: {
        type: "object",
        properties: {
          accountId: { type: "string" },
          stage: { type: "string", enum: ["STOPPED_BAD_DOMAIN", "PAYLOAD_READY"] },
          flags: { $ref: "#/components/schemas/Flags" },
          steps: {
            type: "array",
            items: {
              type: "object",
              properties: {
                name: { type: "string" },
                status: { type: "string", enum: ["SUCCEEDED", "SKIPPED", "STOPPED", "UNRESOLVED", "FAILED"] },
                info: { type: "object", additionalProperties: true },
              },
            },
          },
          assessment: { $ref: "#/components/schemas/Assessment" },
        },
      },
      AnalyzeResponse: {
        type: "object",
        properties: {
          status: { type: "string", enum: ["success"] },
          message: { type: "string" },
          data: {
            type: "object",
            properties: {
              accounts: { type: "array", items: { $ref: "#/components/schemas/AccountAnalysis" } },
              summary: {
                type: "object",
                properties: {
                  total_requested: { type: "integer" },
                  accounts_retrieved: { type: "integer" },
                  invalid_ids: { type: "array", items: { type: "string" } },
                  not_found_ids: { type: "array", items: { type: "string" } },
                  failed_ids: {
                    type: "array",
                    items: {
                      type: "object",
                      properties: { id: { type: "string" }, error: { type: "string" } },
                    },
                  },
                },
              },
              execution_time: { type: "string" },
            },
          },
        },
      },
      ValidateResponse: {
        type: "object",
        properties: {
          status: { type: "string" },
          message: { type: "string" },
          data: {
            type: "object",
            properties: {
              valid_account_ids: { type: "array", items: { type: "string" } },
              invalid_account_ids: { type: "array", items: { type: "string" } },
              format_invalid_count: { type: "integer" },
              not_found_count: { type: "integer" },
            },
          },
        },
      },
      QueryIdsResponse: {
        type: "object",
        properties: {
          status: { type: "string" },
          message: { type: "string" },
          data: {
            type: "object",
            properties: {
              account_ids: { type: "array", items: { type: "string" } },
              summary: {
                type: "object",
                properties: {
                  total_found: { type: "integer" },
                  final_query: { type: "string" },
                  effective_limit: { type: "integer", nullable: true },
                },
              },
            },
          },
        },
      },
      DomainCheckResponse: {
        type: "object",
        properties: {
          status: { type: "string" },
          data: {
            type: "object",
            properties: {
              value: { type: "string" },
              domain: { type: "string" },
              repaired: { type: "string" },
              isBad: { type: "boolean" },
            },
          },
        },
      },
    },
  },
} as const;

export default openapiSpec;
