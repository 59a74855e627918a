import React, { useEffect, useState } from 'react';
import { Box, Text, useApp, useInput } from 'ink';
import type {
  AgentLock,
  AgentState,
  RequestOutcome,
  ResearchReport,
  SystemPhase,
  Task,
  TickertapeConfig,
} from '@tickertape/shared';
import { THEME } from '../theme.js';
import type { TickertapeClient } from '../ws.client.js';
import { useAppStore } from '../store/app.store.js';
import { parseInput } from '../slash.commands.js';
import { Header } from './Header.js';
import { Transcript } from './Transcript.js';
import { TaskTable } from './TaskTable.js';
import { ThinkingPanel } from './ThinkingPanel.js';
import { InputBar, type InputMode } from './InputBar.js';

interface AppProps {
  config: TickertapeConfig;
  client: TickertapeClient;
}

// ---------------------------------------------------------------------------
// App
// ---------------------------------------------------------------------------

export const App: React.FC<AppProps> = ({ config, client }) => {
  const { exit } = useApp();
  const [state, dispatch] = useAppStore();
  const [spinnerFrame, setSpinnerFrame] = useState(0);
  const [clockTime, setClockTime] = useState(() => new Date().toLocaleTimeString());

  const isBusy = state.pending !== null || state.phase !== 'idle';

  // ── Server event wiring ────────────────────────────────────────────────────
  useEffect(() => {
    const onPhase = (phase: SystemPhase) => dispatch({ type: 'PHASE', phase });
    const onTask = (task: Task) => dispatch({ type: 'TASK_UPDATE', task });
    const onReset = () => dispatch({ type: 'SYSTEM_RESET' });
    const onAgent = (agentState: AgentState) => dispatch({ type: 'AGENT_STATE', state: agentState });
    const onLocks = (locks: AgentLock[]) => dispatch({ type: 'LOCK_UPDATE', locks });
    const onComplete = (outcome: RequestOutcome) => dispatch({ type: 'REQUEST_COMPLETE', outcome });
    const onQuestions = (payload: { symbol: string; questions: string[] }) =>
      dispatch({ type: 'RESEARCH_QUESTIONS', symbol: payload.symbol, questions: payload.questions });
    const onReport = (report: ResearchReport) => dispatch({ type: 'RESEARCH_COMPLETE', report });
    const onSlash = (payload: { command: string; output: string }) =>
      dispatch({ type: 'SLASH_RESULT', command: payload.command, output: payload.output });
    const onError = (err: Error) => dispatch({ type: 'ERROR', message: err.message });

    client.on('phase', onPhase);
    client.on('task:update', onTask);
    client.on('system:reset', onReset);
    client.on('agent:state', onAgent);
    client.on('lock:update', onLocks);
    client.on('request:complete', onComplete);
    client.on('research:questions', onQuestions);
    client.on('research:complete', onReport);
    client.on('slash:result', onSlash);
    client.on('ws:error', onError);

    return () => {
      client.off('phase', onPhase);
      client.off('task:update', onTask);
      client.off('system:reset', onReset);
      client.off('agent:state', onAgent);
      client.off('lock:update', onLocks);
      client.off('request:complete', onComplete);
      client.off('research:questions', onQuestions);
      client.off('research:complete', onReport);
      client.off('slash:result', onSlash);
      client.off('ws:error', onError);
    };
  }, [client, dispatch]);

  // ── Spinner and clock ──────────────────────────────────────────────────────
  useEffect(() => {
    if (!isBusy) return;
    const timer = setInterval(() => setSpinnerFrame((f) => f + 1), 100);
    return () => clearInterval(timer);
  }, [isBusy]);

  useEffect(() => {
    const timer = setInterval(() => setClockTime(new Date().toLocaleTimeString()), 1000);
    return () => clearInterval(timer);
  }, []);

  // ── Keyboard: Ctrl+C ───────────────────────────────────────────────────────
  useInput((input, key) => {
    if (key.ctrl && input === 'c') exit();
  });

  // ── Input handler ──────────────────────────────────────────────────────────
  const handleInput = (input: string) => {
    const intent = parseInput(input, state.researchSymbol !== null);

    switch (intent.kind) {
      case 'exit':
        exit();
        return;

      case 'invalid':
        dispatch({ type: 'ERROR', message: intent.message });
        return;

      case 'request':
        dispatch({ type: 'SENT', pending: 'request', echo: intent.prompt });
        client.submitRequest(intent.prompt);
        return;

      case 'research':
        dispatch({ type: 'SENT', pending: 'research_start', echo: input });
        client.startResearch(intent.symbol);
        return;

      case 'research_answer':
        dispatch({ type: 'SENT', pending: 'research_answer', echo: intent.answers });
        client.answerResearch(intent.answers);
        return;

      case 'slash':
        dispatch({ type: 'SENT', pending: 'slash', echo: input });
        client.sendSlashCommand(intent.command, intent.args);
        return;
    }
  };

  const inputMode: InputMode = isBusy ? 'busy' : state.researchSymbol !== null ? 'research_answer' : 'idle';

  // ── Render ─────────────────────────────────────────────────────────────────
  return (
    <Box flexDirection="column">
      <Header
        model={`${config.provider.name}/${config.provider.model}`}
        phase={state.phase}
        isBusy={isBusy}
        spinnerFrame={spinnerFrame}
        clockTime={clockTime}
      />

      {state.transcript.length === 0 && (
        <Text color={THEME.textDim}>
          Ask about any token, e.g. "How is ETH doing this week?", or type /help.
        </Text>
      )}

      <Transcript entries={state.transcript} />

      {isBusy && <TaskTable tasks={state.tasks.slice(-8)} locks={state.locks} />}

      {isBusy && state.pending !== 'slash' && (
        <ThinkingPanel agentStates={state.agentStates} spinnerFrame={spinnerFrame} />
      )}

      <InputBar mode={inputMode} onSubmit={handleInput} researchSymbol={state.researchSymbol} />
    </Box>
  );
};
