import { useMemo, useState } from "react";

type RiskBand = "hospitalization" | "quarantine" | "clean";

type ReportLine = {
  band: RiskBand;
  name: string;
  id: number;
  age: number;
  /** "Infinity" or "NaN" when the probability is not finite. */
  probability: number | string;
  riskAge: boolean;
  message: string;
};

type RiskBandLists = {
  hospitalization_required: number[];
  quarantine_required: number[];
  no_serious_risk: number[];
  risk_age: number[];
};

type AnalyzeResponse = {
  data: ReportLine[];
  lists: RiskBandLists;
  degenerate: number;
};

function isAnalyzeResponse(body: unknown): body is AnalyzeResponse {
  if (!body || typeof body !== "object") return false;
  return "data" in body && Array.isArray(body.data) && "lists" in body;
}

function errorMessage(body: unknown, status: number): string {
  if (body && typeof body === "object" && "error" in body) {
    const e = body.error;
    if (e && typeof e === "object" && "message" in e) return String(e.message);
    if (typeof e === "string") return e;
  }
  return `HTTP ${status}`;
}

const BAND_LABELS: Record<RiskBand, string> = {
  hospitalization: "Hospitalization",
  quarantine: "Quarantine",
  clean: "No serious risk",
};

export default function Home() {
  const [roster, setRoster] = useState("Alice 1 30\nBob 2 70\n");
  const [meetings, setMeetings] = useState("1\n1 2 1.0 30.0\n");
  const [clamp, setClamp] = useState(false);

  const [loading, setLoading] = useState(false);
  const [error, setError] = useState<string | null>(null);
  const [result, setResult] = useState<AnalyzeResponse | null>(null);

  const counts = useMemo(() => {
    if (!result) return null;
    return {
      hospitalization: result.lists.hospitalization_required.length,
      quarantine: result.lists.quarantine_required.length,
      clean: result.lists.no_serious_risk.length,
      riskAge: result.lists.risk_age.length,
    };
  }, [result]);

  async function runAnalysis(): Promise<void> {
    setLoading(true);
    setError(null);
    setResult(null);

    try {
      const res = await fetch("/analyze", {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify({ roster, meetings, clamp }),
      });

      const body: unknown = await res.json();
      if (!res.ok) throw new Error(errorMessage(body, res.status));
      if (!isAnalyzeResponse(body)) throw new Error("Unexpected response shape");

      setResult(body);
    } catch (e) {
      setError(e instanceof Error ? e.message : "Failed to analyze");
    } finally {
      setLoading(false);
    }
  }

  return (
    <main>
      <h1>Exposure Risk Analysis</h1>
      <p>
        Paste the roster (<code>name id age</code>) and the meetings (sick id,
        then <code>infectorId infectedId distance time</code>).
      </p>

      <section>
        <h2>Inputs</h2>
        <div>
          <label>
            Roster
            <br />
            <textarea
              value={roster}
              onChange={(e) => setRoster(e.target.value)}
              rows={8}
              style={{ width: "min(640px, 100%)" }}
            />
          </label>
        </div>

        <div style={{ marginTop: 12 }}>
          <label>
            Meetings
            <br />
            <textarea
              value={meetings}
              onChange={(e) => setMeetings(e.target.value)}
              rows={8}
              style={{ width: "min(640px, 100%)" }}
            />
          </label>
        </div>

        <div style={{ marginTop: 12 }}>
          <label>
            <input
              type="checkbox"
              checked={clamp}
              onChange={(e) => setClamp(e.target.checked)}
            />{" "}
            Clamp transmission to [0, 1]
          </label>
        </div>

        <div style={{ marginTop: 12 }}>
          <button onClick={() => void runAnalysis()} disabled={loading}>
            {loading ? "Analyzing…" : "Analyze"}
          </button>
        </div>
      </section>

      <section style={{ marginTop: 24 }}>
        <h2>Report</h2>

        {error ? (
          <p style={{ color: "crimson" }}>
            Error: <code>{error}</code>
          </p>
        ) : null}

        {result && counts ? (
          <>
            <ul>
              <li>
                Hospitalization: <strong>{counts.hospitalization}</strong>
              </li>
              <li>
                Quarantine: <strong>{counts.quarantine}</strong>
              </li>
              <li>
                No serious risk: <strong>{counts.clean}</strong>
              </li>
              <li>
                Risk age: <strong>{counts.riskAge}</strong>
              </li>
            </ul>

            {result.degenerate > 0 ? (
              <p style={{ color: "darkorange" }}>
                {result.degenerate} probabilities are not finite (zero-distance
                meetings).
              </p>
            ) : null}

            <table cellPadding={6} style={{ borderCollapse: "collapse" }}>
              <thead>
                <tr>
                  <th align="left">Name</th>
                  <th align="right">Id</th>
                  <th align="right">Age</th>
                  <th align="right">Probability</th>
                  <th align="left">Band</th>
                </tr>
              </thead>
              <tbody>
                {result.data.map((l) => (
                  <tr key={l.id}>
                    <td>{l.name}</td>
                    <td align="right">
                      <code>{l.id}</code>
                    </td>
                    <td align="right">
                      {l.age}
                      {l.riskAge ? " *" : ""}
                    </td>
                    <td align="right">{l.probability}</td>
                    <td>{BAND_LABELS[l.band]}</td>
                  </tr>
                ))}
              </tbody>
            </table>
          </>
        ) : (
          <p>No results loaded yet.</p>
        )}
      </section>
    </main>
  );
}
