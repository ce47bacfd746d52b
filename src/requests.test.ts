import { describe, expect, test } from "vitest";
import { handleAnalyzeRequest } from "./requests";

describe("handleAnalyzeRequest", () => {
  test("returns report lines and band lists", () => {
    const res = handleAnalyzeRequest({
      roster: "Alice 1 30\nBob 2 70\nCarl 3 40\n",
      meetings: "1\n1 2 1 3\n",
    });

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({
      data: [
        { id: 1, band: "hospitalization", message: "Hospitalization Required: Alice 1." },
        { id: 2, band: "quarantine", message: "14-days-Quarantine Required: Bob 2." },
        { id: 3, band: "clean", message: "No serious chance for infection: Carl 3." },
      ],
      lists: {
        hospitalization_required: [1],
        quarantine_required: [2],
        no_serious_risk: [3],
        risk_age: [2],
      },
      degenerate: 0,
    });
  });

  test("applies the clamp option", () => {
    const res = handleAnalyzeRequest({
      roster: "A 1 20\nB 2 20\n",
      meetings: "1\n1 2 0.5 30\n",
      clamp: true,
    });

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({ data: [{ id: 2, probability: 1 }, { id: 1 }] });
  });

  test("sends non-finite probabilities as strings", () => {
    const res = handleAnalyzeRequest({
      roster: "A 1 20\nB 2 20\nC 3 20\n",
      meetings: "1\n1 2 0 10\n3 1 0 10\n",
    });

    expect(res.status).toBe(200);
    expect(res.body).toMatchObject({
      data: [
        { id: 2, probability: "Infinity", band: "hospitalization" },
        { id: 3, probability: 0 },
        { id: 1, probability: "NaN", band: "clean" },
      ],
      degenerate: 2,
    });
    expect(JSON.parse(JSON.stringify(res.body))).toMatchObject({
      data: [{ probability: "Infinity" }, { probability: 0 }, { probability: "NaN" }],
    });
  });

  test("rejects an invalid body with 400", () => {
    const res = handleAnalyzeRequest({ roster: 1 });

    expect(res.status).toBe(400);
    expect(res.body).toMatchObject({
      error: {
        code: "VALIDATION_ERROR",
        fields: [{ field: "roster" }, { field: "meetings" }],
      },
    });
  });

  test("reports analysis failures with 422", () => {
    const res = handleAnalyzeRequest({ roster: "A 1 20\n", meetings: "1\n1 9 1 30\n" });

    expect(res.status).toBe(422);
    expect(res.body).toMatchObject({
      error: {
        name: "UnknownParticipantError",
        code: "UNKNOWN_PARTICIPANT",
        details: { participantId: 9, role: "infected", line: 2 },
      },
    });
  });
});
