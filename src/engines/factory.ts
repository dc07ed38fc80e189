import { ExtractEngine } from '../config/index.js';
import { ScriptGenerator } from '../generator/generator.js';
import { DriverConnection } from './driver/DriverConnection.js';
import { DriverInspector } from './driver/DriverInspector.js';
import { ICommandExecutor, ISchemaInspector, IScriptGenerator } from './interfaces.js';
import { ShellExecutor } from './shell/ShellExecutor.js';
import { ShellInspector } from './shell/ShellInspector.js';

export class EngineFactory {
  static createExecutor(uri: string, client: string): ICommandExecutor {
    return new ShellExecutor(uri, client);
  }

  static createInspector(engine: ExtractEngine, uri: string, client: string, timeoutSeconds: number): ISchemaInspector {
    switch (engine) {
      case 'shell':
        return new ShellInspector(EngineFactory.createExecutor(uri, client));
      case 'driver':
        return new DriverInspector(new DriverConnection(uri, timeoutSeconds * 1000));
      default:
        throw new Error(`Unsupported extraction engine: ${String(engine)}`);
    }
  }

  static createGenerator(): IScriptGenerator {
    return new ScriptGenerator();
  }
}
