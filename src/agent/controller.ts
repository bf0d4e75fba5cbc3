/**
 * Agent Controller
 *
 * The `ai` command: snapshot the selected frame, ask the model, report, and drive
 * the suggested commands once confirmed.
 *
 *   idle -> analyzing -> reporting -> (driving) -> idle
 */

import type { AgentConsole } from '../output/console.js';
import { driveCommands } from './driver.js';
import type { DiagnosisService } from './inference.js';
import type { SnapshotBuilder } from './snapshot.js';
import type { Confirm, DebuggerCapability, Diagnosis } from './types.js';

export type AgentState = 'idle' | 'analyzing' | 'reporting' | 'driving';

type SnapshotSource = Pick<SnapshotBuilder, 'capture'>;

export interface AgentControllerDeps {
  snapshots: SnapshotSource;
  inference: DiagnosisService;
  confirm: Confirm;
  console: AgentConsole;
}

export class AgentController {
  private snapshots: SnapshotSource;
  private inference: DiagnosisService;
  private confirm: Confirm;
  private console: AgentConsole;
  private _state: AgentState = 'idle';

  constructor(deps: AgentControllerDeps) {
    this.snapshots = deps.snapshots;
    this.inference = deps.inference;
    this.confirm = deps.confirm;
    this.console = deps.console;
  }

  get state(): AgentState {
    return this._state;
  }

  /**
   * Run one analysis round-trip against the session.
   *
   * Resolves with the diagnosis, or null when no analysis ran. Rejects only when a
   * driven command fails; the controller is back to idle either way.
   */
  async ai(session: DebuggerCapability, arg = ''): Promise<Diagnosis | null> {
    if (this._state !== 'idle') {
      this.console.error(`Cannot start an analysis while ${this._state}`);
      return null;
    }

    const frame = session.currentFrame();
    if (!frame) {
      this.console.error('No frame selected; the program is not stopped');
      return null;
    }

    try {
      this._state = 'analyzing';
      const snapshot = await this.snapshots.capture(frame, session.failure());
      this.console.info('Thinking... (Analyzing Stack & Variables)');
      const diagnosis = await this.inference.query(snapshot, arg);

      this._state = 'reporting';
      this.report(diagnosis);

      if (diagnosis.commands.length > 0) {
        this._state = 'driving';
        await driveCommands(diagnosis.commands, this.confirm, (command) => session.execute(command), this.console);
      }

      this.console.print('=======================');
      this.console.print();
      return diagnosis;
    } finally {
      this._state = 'idle';
    }
  }

  private report(diagnosis: Diagnosis): void {
    this.console.print();
    this.console.print('=== AI DIAGNOSIS ===');
    this.console.print(`Diagnosis: ${diagnosis.diagnosis}`);
    this.console.print(`Fix:       ${diagnosis.suggestedFix}`);
  }
}
