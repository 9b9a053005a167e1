#!/usr/bin/env node
// src/ui/wsTextClient.ts
//
// Interactive text client for the minehunt ws server.
//
// Usage (interactive): see USAGE in ./commands
//
// Env:
//   MINEHUNT_WS_URL=ws://localhost:8787
//   MINEHUNT_CLIENT_ID=alice   (optional; enables resume when the server persists sessions)

import fs from "node:fs";
import readline from "node:readline";
import WebSocket from "ws";
import type { ClientMessage, ServerMessage } from "../server/protocol";
import { elapsedMs, type GameSnapshot } from "../engine";
import { parseCommand, USAGE } from "./commands";

const WS_URL = process.env.MINEHUNT_WS_URL ?? "ws://localhost:8787";
const CLIENT_ID = process.env.MINEHUNT_CLIENT_ID;

const SERVER_TYPES: ReadonlySet<string> = new Set<ServerMessage["type"]>([
  "welcome",
  "gameSync",
  "revealResult",
  "flagResult",
  "layoutRejected",
  "error",
]);

const rl = readline.createInterface({ input: process.stdin, output: process.stdout });

function prompt(line = "> ") {
  rl.setPrompt(line);
  rl.prompt();
}

function log(title: string, obj?: unknown) {
  console.log(`\n--- ${title} ---`);
  if (obj !== undefined) console.dir(obj, { depth: null });
}

function isServerMessage(x: unknown): x is ServerMessage {
  if (!x || typeof x !== "object" || !("type" in x)) return false;
  return typeof x.type === "string" && SERVER_TYPES.has(x.type);
}

function logGame(title: string, snap: GameSnapshot, stateHash: string) {
  log(title, {
    status: snap.status,
    clickedCount: snap.clickedCount,
    flagCount: snap.flagCount,
    mineCount: snap.mineCount,
    treasureCount: snap.treasureCount,
    elapsedMs: elapsedMs(snap, new Date()),
    stateHash,
  });
}

let ws: WebSocket;
let helloSent = false;

function send(msg: ClientMessage) {
  ws.send(JSON.stringify(msg));
}

function handleServerMessage(msg: ServerMessage) {
  switch (msg.type) {
    case "welcome": {
      if (!helloSent) {
        helloSent = true;
        send({ type: "hello", clientId: CLIENT_ID });
        return;
      }
      log("WELCOME", msg);
      if (!msg.resumed) console.log("Type 'new' to start a game (or 'help').");
      return prompt();
    }

    case "gameSync": {
      logGame("GAME", msg.snapshot, msg.stateHash);
      return prompt();
    }

    case "revealResult": {
      const { outcome } = msg;
      if (outcome.kind === "alreadyRevealedOrFlagged") console.log("Cell already revealed or flagged.");
      log("REVEAL", outcome);
      logGame("GAME", msg.snapshot, msg.stateHash);
      if (msg.snapshot.status === "won") console.log("Congratulations! You won the game!");
      if (msg.snapshot.status === "lost") console.log("Game Over! You hit a mine!");
      return prompt();
    }

    case "flagResult": {
      if (msg.outcome.kind === "alreadyRevealed") console.log("Cell already revealed.");
      logGame("GAME", msg.snapshot, msg.stateHash);
      return prompt();
    }

    case "layoutRejected": {
      console.log(`Layout rejected (${msg.rule}): ${msg.message}`);
      return prompt();
    }

    case "error": {
      log("ERROR", msg);
      return prompt();
    }
  }
}

function connect() {
  ws = new WebSocket(WS_URL);

  ws.on("open", () => {
    console.log(`connected: true url=${WS_URL}`);
  });

  ws.on("message", (raw) => {
    let parsed: unknown;
    try {
      parsed = JSON.parse(String(raw));
    } catch (err) {
      log("UNPARSEABLE SERVER MESSAGE", String(err));
      return prompt();
    }
    if (!isServerMessage(parsed)) {
      log("UNKNOWN SERVER MESSAGE", parsed);
      return prompt();
    }
    handleServerMessage(parsed);
  });

  ws.on("close", () => {
    console.log("disconnected");
    process.exit(0);
  });

  ws.on("error", (err) => {
    console.error("ws error:", err);
  });
}

rl.on("line", (line) => {
  const cmd = parseCommand(line);
  if (!cmd) return prompt();

  switch (cmd.kind) {
    case "quit":
      rl.close();
      process.exit(0);
    case "help":
      console.log(`\n${USAGE}\n`);
      return prompt();
    case "invalid":
      console.log(cmd.message);
      return prompt();
    case "new":
      return send({
        type: "newGame",
        rows: cmd.rows,
        cols: cmd.cols,
        mineCount: cmd.mineCount,
        treasureCount: cmd.treasureCount,
        seed: cmd.seed,
      });
    case "reveal":
      return send({ type: "reveal", row: cmd.row, col: cmd.col });
    case "flag":
      return send({ type: "flag", row: cmd.row, col: cmd.col });
    case "restart":
      return send({ type: "restart" });
    case "show":
      return send({ type: "getSnapshot" });
    case "layout": {
      let layout: string;
      try {
        layout = fs.readFileSync(cmd.file, "utf8");
      } catch (err) {
        console.log(`Cannot read ${cmd.file}: ${err instanceof Error ? err.message : String(err)}`);
        return prompt();
      }
      return send({ type: "loadLayout", layout });
    }
  }
});

connect();
