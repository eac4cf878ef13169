import path from 'path';
import type { Request, Response } from 'express';
import {
  TpaServer,
  TpaSession,
  StreamType,
  ViewType,
} from '@augmentos/sdk';
import { AppConfig, loadConfig } from './config';
import { openingMessage, renderBoard, renderOutcome, restingView, strategyLabel } from './display';
import { GameController, GameSnapshot } from './game/game_controller';
import { fetchSettings, getUserStrategy } from './settings_handler';
import { parseVoiceCommand } from './voice_commands';

const config = loadConfig();

const MESSAGE_PAUSE_MS = 1500;

interface Transcript {
  text: string;
  isFinal: boolean;
  transcribeLanguage?: string;
}

interface UserGame {
  controller: GameController;
  session: TpaSession;
}

/**
 * Shows text in the main view of the glasses.
 */
function showText(session: TpaSession, text: string): void {
  console.log(`Game board to show: \n${text}`);
  session.layouts.showTextWall(text, {
    view: ViewType.MAIN,
    durationMs: 60 * 1000,
  });
}

/**
 * Shows a short message, then brings back the board or the end-of-game prompt.
 */
function flashMessage(session: TpaSession, message: string, controller: GameController): void {
  showText(session, message);
  setTimeout(() => {
    showText(session, restingView(controller.snapshot()));
  }, MESSAGE_PAUSE_MS);
}

/**
 * StrategyTicTacToeApp - voice-driven game against a selectable computer strategy
 */
class StrategyTicTacToeApp extends TpaServer {
  // One game per user, kept across sessions
  private readonly userGames = new Map<string, UserGame>();

  constructor(private readonly appConfig: AppConfig) {
    super({
      packageName: appConfig.packageName,
      apiKey: appConfig.apiKey,
      port: appConfig.port,
      publicDir: path.resolve(__dirname, './public'),
    });
  }

  protected async onSession(session: TpaSession, sessionId: string, userId: string): Promise<void> {
    console.log(`Received Tic Tac Toe session request for user ${userId}, session ${sessionId}`);

    try {
      await fetchSettings(userId, this.appConfig);
      const strategy = getUserStrategy(userId, this.appConfig);

      let game = this.userGames.get(userId);
      if (game) {
        game.session = session;
        game.controller.setStrategy(strategy);
      } else {
        game = this.createGame(session, userId);
      }

      session.subscribe(StreamType.TRANSCRIPTION);
      const cleanup = session.events.onTranscription((data: Transcript) => {
        this.handleTranscription(sessionId, userId, data);
      });
      this.addCleanupHandler(cleanup);

      const controller = game.controller;
      const greeting = openingMessage(controller.snapshot());
      if (greeting) {
        flashMessage(session, greeting, controller);
      } else {
        showText(session, restingView(controller.snapshot()));
      }
    } catch (error) {
      console.error('Error initializing session:', error);
    }
  }

  protected async onStop(sessionId: string, userId: string, reason: string): Promise<void> {
    console.log(`Session ${sessionId} for user ${userId} stopped: ${reason}`);
  }

  private createGame(session: TpaSession, userId: string): UserGame {
    const game: UserGame = {
      session,
      controller: new GameController({
        strategy: getUserStrategy(userId, this.appConfig),
        computerMoveDelayMs: this.appConfig.computerMoveDelayMs,
        onUpdate: snapshot => this.render(game.session, snapshot),
      }),
    };
    this.userGames.set(userId, game);
    return game;
  }

  private render(session: TpaSession, snapshot: GameSnapshot): void {
    showText(session, renderBoard(snapshot.board, snapshot.winningLine));

    const outcome = renderOutcome(snapshot);
    if (outcome) {
      setTimeout(() => showText(session, outcome), MESSAGE_PAUSE_MS);
    }
  }

  private handleTranscription(sessionId: string, userId: string, transcript: Transcript): void {
    const text = transcript.text.toLowerCase().trim();
    const language = transcript.transcribeLanguage ?? 'en-US';
    console.log(`[Session ${sessionId}]: Received transcription in language: ${language} - ${text} (isFinal: ${transcript.isFinal})`);

    if (!transcript.isFinal) return;

    const game = this.userGames.get(userId);
    if (!game) return;
    const { controller, session } = game;

    const command = parseVoiceCommand(text);
    if (!command) return;

    switch (command.type) {
      case 'new_game':
        controller.setStrategy(getUserStrategy(userId, this.appConfig));
        controller.newGame();
        return;
      case 'rematch':
        controller.rematch();
        return;
      case 'set_strategy':
        controller.setStrategy(command.strategy);
        flashMessage(session, `AI: ${strategyLabel({ strategy: command.strategy })}`, controller);
        return;
      case 'move': {
        const snapshot = controller.snapshot();
        if (snapshot.status !== 'in_progress') {
          const outcome = renderOutcome(snapshot);
          if (outcome) showText(session, outcome);
          return;
        }
        if (snapshot.pendingComputerMove) {
          flashMessage(session, 'Not your turn!', controller);
          return;
        }
        if (!controller.applyHumanMove(command.index)) {
          console.log(`[Session ${sessionId}]: Rejected move at position ${command.index + 1}`);
          flashMessage(session, 'Invalid move!', controller);
        }
        return;
      }
    }
  }

  /**
   * Re-reads a user's settings and applies the strategy to their game.
   */
  public async updateSettings(userId: string): Promise<{ status: string; strategy: string }> {
    console.log('Received settings update for user:', userId);

    const { strategy } = await fetchSettings(userId, this.appConfig);
    this.userGames.get(userId)?.controller.setStrategy(strategy);

    return {
      status: 'settings updated',
      strategy,
    };
  }
}

const strategyApp = new StrategyTicTacToeApp(config);

const expressApp = strategyApp.getExpressApp();
expressApp.post('/settings', async (req: Request, res: Response) => {
  try {
    const userIdForSettings: unknown = req.body?.userIdForSettings;

    if (typeof userIdForSettings !== 'string' || !userIdForSettings) {
      res.status(400).json({ error: 'Missing userIdForSettings in payload' });
      return;
    }

    const result = await strategyApp.updateSettings(userIdForSettings);
    res.json(result);
  } catch (error) {
    console.error('Error in settings endpoint:', error);
    res.status(500).json({ error: 'Internal server error updating settings' });
  }
});

expressApp.get('/health', (_req: Request, res: Response) => {
  res.json({ status: 'healthy', app: config.packageName });
});

strategyApp.start().then(() => {
  console.log(`${config.packageName} server running on port ${config.port}`);
}).catch(error => {
  console.error('Failed to start server:', error);
});
