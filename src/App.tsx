// src/App.tsx

import { Suspense, lazy, useCallback, useEffect, useMemo, useRef, useState } from "react";
import { Section } from "./components/Section";
import ErrorBoundary from "./components/ErrorBoundary";
import { ScenarioControls } from "./components/ScenarioControls";
import { WalletPanel, type WalletStatus } from "./components/WalletPanel";
import { CohortCards } from "./components/CohortCards";
import { ShareTable } from "./components/ShareTable";
import { RevealStepper } from "./components/RevealStepper";
import { SharePanel } from "./components/SharePanel";
import { ScenarioJournalSection } from "./components/ScenarioJournalSection";

import { fetchDistributions, fetchWallet } from "./lib/api";
import { DEFAULT_PRIMARY_COHORT, cohortMap, type LoadedCohort } from "./lib/cohorts";
import { DEFAULT_REVEAL_DURATION_S, parseClientConfig } from "./lib/config";
import { buildScenarioContext } from "./lib/context";
import { downloadText } from "./lib/download";
import { formatUsd } from "./lib/format";
import { journalLines } from "./lib/journal";
import { createLogger, formatToggle, formatWalletLookup } from "./lib/logger";
import { apiUrl } from "./lib/net";
import { determinePercentileBand, formatBand } from "./lib/percentile";
import {
  applyInputs,
  applyWalletBand,
  clearWallet,
  markRevealed,
  needsReveal,
  parseSession,
  serializeSession,
  type InputsPatch,
  type SessionContext,
} from "./lib/session";
import {
  ShareCardMemo,
  buildShareCardPayload,
  prefetchShareCard,
  requestShareCard,
  shareCardKey,
  type ShareCard,
} from "./lib/shareCard";
import { buildSliderDefaults } from "./lib/sliders";
import { formatWalletAddress, hasSummary, isWalletAddress, walletTotalUsd, type WalletReport } from "./lib/wallet";

const FdvHeatmap = lazy(() => import("./components/FdvHeatmap"));
const PercentileCurveChart = lazy(() => import("./components/PercentileCurveChart"));

const STORAGE_KEY = "airdrop:session";
const JOURNAL_LIMIT = 200;
const log = createLogger("app");
const clientConfig = parseClientConfig(import.meta.env);

function loadStoredSession(): SessionContext {
  try {
    return parseSession(localStorage.getItem(STORAGE_KEY));
  } catch {
    return parseSession(null);
  }
}

type LoadState = { kind: "loading" } | { kind: "ready" } | { kind: "error"; message: string };

export default function App() {
  const [session, setSession] = useState<SessionContext>(loadStoredSession);
  const sessionRef = useRef(session);
  sessionRef.current = session;

  const [cohorts, setCohorts] = useState<LoadedCohort[]>([]);
  const [loadState, setLoadState] = useState<LoadState>({ kind: "loading" });
  const [demoWallet, setDemoWallet] = useState(clientConfig.demoWallet);

  const [walletInput, setWalletInput] = useState(session.walletAddress ?? "");
  const [walletStatus, setWalletStatus] = useState<WalletStatus>({ kind: "idle" });
  const [walletReport, setWalletReport] = useState<WalletReport | null>(null);

  const [journal, setJournal] = useState<string[]>([]);
  const [revealing, setRevealing] = useState(false);

  const shareMemo = useRef(new ShareCardMemo());
  const [shareCard, setShareCard] = useState<ShareCard | null>(null);
  const [shareWarning, setShareWarning] = useState<string | null>(null);
  const [shareBusy, setShareBusy] = useState(false);

  const pushJournal = useCallback((lines: string[]) => {
    if (!lines.length) return;
    setJournal((prev) => [...prev, ...lines].slice(-JOURNAL_LIMIT));
  }, []);

  useEffect(() => {
    try {
      localStorage.setItem(STORAGE_KEY, serializeSession(session));
    } catch (err) {
      log.warn("could not persist session", err);
    }
  }, [session]);

  const cohortsByName = useMemo(() => cohortMap(cohorts), [cohorts]);
  const primaryName =
    session.primaryCohort && cohortsByName.has(session.primaryCohort) ? session.primaryCohort : DEFAULT_PRIMARY_COHORT;
  const primary = cohortsByName.get(primaryName);
  const sliderDefaults = useMemo(() => buildSliderDefaults(primary?.estimate ?? 0), [primary]);

  // snapshots: load once, then snap the cohort slider onto the primary cohort's options
  useEffect(() => {
    let cancelled = false;
    fetchDistributions()
      .then((res) => {
        if (cancelled) return;
        setCohorts(res.cohorts);
        if (res.demoWallet) setDemoWallet(res.demoWallet);
        setLoadState({ kind: "ready" });
        log.info(`loaded ${res.cohorts.length} cohort snapshots`);
      })
      .catch((err: unknown) => {
        if (cancelled) return;
        const message = err instanceof Error ? err.message : String(err);
        log.error("failed to load distributions", err);
        setLoadState({ kind: "error", message });
      });
    return () => {
      cancelled = true;
    };
  }, []);

  useEffect(() => {
    if (!primary) return;
    // a fresh (or stale) session starts on the default cohort's midpoint
    setSession((s) =>
      applyInputs(
        s,
        s.primaryCohort === primary.name ? {} : { primaryCohort: primary.name, cohortSize: sliderDefaults.midpoint },
        { cohortOptions: sliderDefaults.options }
      )
    );
  }, [primary, sliderDefaults]);

  const onInputs = useCallback(
    (patch: InputsPatch) => {
      const prev = sessionRef.current;
      let effective = patch;
      if (patch.primaryCohort && patch.primaryCohort !== prev.primaryCohort) {
        // a new OG definition re-anchors the wallet slider on its own estimate
        const next = cohortsByName.get(patch.primaryCohort);
        if (next) effective = { ...patch, cohortSize: buildSliderDefaults(next.estimate).midpoint };
      }
      const nextPrimary = cohortsByName.get(effective.primaryCohort ?? primaryName);
      const options = nextPrimary ? buildSliderDefaults(nextPrimary.estimate).options : sliderDefaults.options;
      const next = applyInputs(prev, effective, { cohortOptions: options });
      pushJournal(journalLines(prev, next));
      setSession(next);
    },
    [cohortsByName, primaryName, sliderDefaults, pushJournal]
  );

  const ctx = useMemo(
    () =>
      buildScenarioContext({
        cohorts: cohortsByName,
        primaryName,
        cohortSize: session.cohortSize,
        tierPct: session.tierPct,
        ogPoolPct: session.ogPoolPct,
        fdvBillion: session.fdvBillion,
        shareOptions: session.shareOptions,
        fdvSensitivity: session.fdvSensitivity,
        walletReport,
      }),
    [cohortsByName, primaryName, session, walletReport]
  );

  const lookupWallet = useCallback(
    async (raw: string) => {
      const address = raw.trim();
      if (!isWalletAddress(address)) {
        setWalletStatus({ kind: "error", message: "Enter a valid 0x wallet address (40 hex characters)." });
        return;
      }
      setWalletStatus({ kind: "loading" });
      try {
        const report = await fetchWallet(address);
        if (!hasSummary(report)) {
          setWalletReport(null);
          setSession((s) => clearWallet(s));
          setWalletStatus({ kind: "info", message: "No trades found for this wallet." });
          pushJournal([formatWalletLookup(formatWalletAddress(address), "no trades")]);
          return;
        }

        const rows = cohortsByName.get(primaryName)?.rows ?? [];
        const band = determinePercentileBand(walletTotalUsd(report), rows, sessionRef.current.cohortSize);
        setWalletReport(report);
        setSession((s) => applyWalletBand(s, band, address));
        setShareCard(null);
        setShareWarning(null);

        const url = new URL(window.location.href);
        url.searchParams.set("wallet", address);
        window.history.replaceState(null, "", url);

        if (band) {
          setWalletStatus({ kind: "ok", message: "Wallet snapshot updated. Your tier now follows your volume." });
          pushJournal([formatWalletLookup(formatWalletAddress(address), formatBand(band))]);
        } else {
          setWalletStatus({
            kind: "info",
            message:
              "This wallet's volume falls outside the cohort size you selected. Increase the cohort or change the OG definition to include it.",
          });
          pushJournal([formatWalletLookup(formatWalletAddress(address), "outside the modelled range")]);
        }
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        log.warn(`wallet lookup failed: ${message}`);
        setWalletStatus({ kind: "error", message: `Failed to fetch wallet data: ${message}` });
      }
    },
    [cohortsByName, primaryName, pushJournal]
  );

  // ?wallet=0x… (or the last stored address) is looked up once the snapshots are in
  const autoFetched = useRef(false);
  useEffect(() => {
    if (loadState.kind !== "ready" || autoFetched.current) return;
    autoFetched.current = true;
    const preset = new URL(window.location.href).searchParams.get("wallet") ?? sessionRef.current.walletAddress;
    if (preset && isWalletAddress(preset)) {
      setWalletInput(preset);
      void lookupWallet(preset);
    }
  }, [loadState, lookupWallet]);

  const onClearWallet = useCallback(() => {
    setWalletReport(null);
    setWalletInput("");
    setWalletStatus({ kind: "idle" });
    setShareCard(null);
    setShareWarning(null);
    setSession((s) => clearWallet(s));
    const url = new URL(window.location.href);
    url.searchParams.delete("wallet");
    window.history.replaceState(null, "", url);
  }, []);

  const cardArgs = useMemo(
    () => ({
      result: ctx.primaryResult,
      tierPct: session.tierPct,
      cohortLabel: ctx.primaryLabel,
      cohortWallets: ctx.primaryCohortWallets,
      featuredShare: ctx.featuredShare,
      fdvBillion: session.fdvBillion,
      ogPoolPct: session.ogPoolPct,
      tokenPrice: ctx.tokenPrice,
    }),
    [ctx, session.tierPct, session.fdvBillion, session.ogPoolPct]
  );

  const sharePayload = useMemo(
    () =>
      session.walletAddress && hasSummary(walletReport)
        ? buildShareCardPayload({ ...cardArgs, walletAddress: session.walletAddress, report: walletReport })
        : null,
    [cardArgs, session.walletAddress, walletReport]
  );

  useEffect(() => {
    const address = session.walletAddress;
    const key = address ? shareCardKey(ctx.signature, address, ctx.primaryLabel) : null;
    setShareCard(key ? shareMemo.current.get(key) ?? null : null);
    setShareWarning(null);
  }, [ctx.signature, ctx.primaryLabel, session.walletAddress]);

  const createCard = useCallback(async () => {
    setShareBusy(true);
    try {
      const out = await prefetchShareCard({
        walletAddress: session.walletAddress,
        report: walletReport,
        card: cardArgs,
        signature: ctx.signature,
        memo: shareMemo.current,
        create: (payload) => requestShareCard(payload, apiUrl("/api/share")),
      });
      setShareCard(out.card);
      setShareWarning(out.warning ?? null);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      log.error("share card failed", err);
      setShareWarning(message);
    } finally {
      setShareBusy(false);
    }
  }, [session.walletAddress, walletReport, cardArgs, ctx.signature]);

  const startReveal = () => {
    pushJournal([formatToggle("Reveal", true)]);
    setRevealing(true);
  };

  const finishReveal = useCallback(() => {
    setRevealing(false);
    setSession((s) => markRevealed(s, ctx.signature));
  }, [ctx.signature]);

  const stale = session.hasRevealedOnce && needsReveal(session, ctx.signature);
  const showResults = session.hasRevealedOnce && !revealing;

  return (
    <div className="min-h-screen">
      <header className="bg-slate-900 text-white">
        <div className="max-w-6xl mx-auto px-4 py-5">
          <h1 className="text-2xl font-bold">OG Airdrop Estimator</h1>
          <p className="text-sm text-slate-300">
            What could an airdrop to early traders be worth? Set the assumptions, look up your wallet, and see where you
            land.
          </p>
        </div>
      </header>

      <main className="max-w-6xl mx-auto px-4 py-6 grid gap-4 lg:grid-cols-[340px_1fr]">
        <div className="space-y-4">
          <ScenarioControls
            session={session}
            cohortNames={cohorts.map((c) => c.name)}
            primaryName={primaryName}
            cohortOptions={sliderDefaults.options}
            cohortEstimate={primary?.estimate ?? 0}
            onChange={onInputs}
          />
          <WalletPanel
            input={walletInput}
            onInput={setWalletInput}
            onLookup={(address) => void lookupWallet(address)}
            onClear={onClearWallet}
            demoWallet={demoWallet}
            status={walletStatus}
            address={session.walletAddress}
            report={walletReport}
            bands={ctx.bands}
            cutoff={primary?.config.cutoff ?? null}
          />
        </div>

        <div className="space-y-4 min-w-0">
          {loadState.kind === "loading" ? (
            <div className="text-sm text-slate-500">Loading cohort snapshots…</div>
          ) : null}
          {loadState.kind === "error" ? (
            <div className="text-sm text-red-800 bg-red-50 rounded px-3 py-2">
              Could not load cohort snapshots: {loadState.message}
            </div>
          ) : null}

          <Section
            id="estimate"
            title="Your estimate"
            subtitle={`${ctx.primaryLabel} · ${ctx.featuredShare}% tier share`}
            actions={
              showResults ? (
                <button className="text-xs border px-2 py-1 rounded" onClick={startReveal}>
                  Replay reveal
                </button>
              ) : null
            }
          >
            {revealing ? (
              <RevealStepper steps={ctx.steps} durationS={DEFAULT_REVEAL_DURATION_S} onDone={finishReveal} />
            ) : null}
            {!session.hasRevealedOnce && !revealing ? (
              <div className="text-center py-6">
                <button className="px-4 py-2 rounded-lg bg-sky-600 text-white font-semibold" onClick={startReveal}>
                  Reveal my estimate
                </button>
              </div>
            ) : null}
            {showResults ? (
              <>
                <div className="text-3xl font-bold">≈ {formatUsd(ctx.primaryResult.usdValue)}</div>
                {stale ? <div className="text-xs text-slate-500">Updated live since your last reveal.</div> : null}
                <CohortCards cards={ctx.cards} />
                <ol className="text-sm list-decimal pl-5 space-y-0.5">
                  {ctx.steps.map((step) => (
                    <li key={step.title}>
                      <span className="font-medium">{step.title}:</span> {step.detail}
                    </li>
                  ))}
                </ol>
              </>
            ) : null}
          </Section>

          {showResults ? (
            <>
              <Section id="share-table" title="Tier share scenarios">
                <ShareTable rows={ctx.snapshot.shareTable} featuredShare={ctx.featuredShare} />
              </Section>

              <Section id="heatmap" title="FDV sensitivity" subtitle="Payout per wallet for each tier share and valuation.">
                <ErrorBoundary title="Heatmap failed to render.">
                  <Suspense fallback={<div className="text-sm text-slate-500">Loading chart…</div>}>
                    <FdvHeatmap cells={ctx.snapshot.heatmap} />
                  </Suspense>
                </ErrorBoundary>
              </Section>

              <Section id="curve" title="Volume by percentile" subtitle="Where the volume sits in each cohort.">
                <ErrorBoundary title="Percentile chart failed to render.">
                  <Suspense fallback={<div className="text-sm text-slate-500">Loading chart…</div>}>
                    <PercentileCurveChart cards={ctx.cards} />
                  </Suspense>
                </ErrorBoundary>
              </Section>

              <Section id="share" title="Share your estimate">
                <SharePanel
                  card={shareCard}
                  payload={sharePayload}
                  warning={shareWarning}
                  busy={shareBusy}
                  onCreate={() => void createCard()}
                />
              </Section>
            </>
          ) : null}

          <ScenarioJournalSection
            journal={journal}
            payoutUsd={ctx.primaryResult.usdValue}
            tokensPerWallet={ctx.primaryResult.tokensPerWallet}
            walletsInTier={ctx.snapshot.walletsInTier}
            tokenPrice={ctx.tokenPrice}
            onClear={() => setJournal([])}
            onDownload={() => downloadText(journal.join("\n"), "scenario-journal.txt")}
          />
        </div>
      </main>
    </div>
  );
}
