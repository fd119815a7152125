/**
 * Helper para criacao de diretorios de teste isolados.
 *
 * Cada teste recebe seu proprio diretorio unico, evitando
 * race conditions entre testes paralelos.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';

// ════════════════════════════════════════════════════════════════════════════
// TIPOS
// ════════════════════════════════════════════════════════════════════════════

export interface TestDataDir {
  /**
   * Caminho absoluto do diretorio de teste
   */
  dir: string;

  /**
   * Remove o diretorio recursivamente, com retry
   */
  cleanup: () => Promise<void>;

  /**
   * Grava um arquivo JSON dentro do diretorio
   */
  escreverJson: (nome: string, conteudo: unknown) => Promise<void>;

  lerJson: (nome: string) => Promise<unknown>;
}

// ════════════════════════════════════════════════════════════════════════════
// CONFIGURACAO
// ════════════════════════════════════════════════════════════════════════════

const CLEANUP_RETRIES = 3;
const CLEANUP_DELAYS = [20, 50, 100]; // ms

function codigoErro(err: unknown): string | null {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return null;
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

// ════════════════════════════════════════════════════════════════════════════
// IMPLEMENTACAO
// ════════════════════════════════════════════════════════════════════════════

/**
 * Cria um diretorio de teste unico (fs.mkdtemp) no tmp do sistema.
 *
 * @example
 * ```typescript
 * let testDir: TestDataDir;
 *
 * beforeEach(async () => {
 *   testDir = await createTestDataDir('motor');
 * });
 *
 * afterEach(async () => {
 *   await testDir.cleanup();
 * });
 * ```
 */
export async function createTestDataDir(prefix: string = 'test'): Promise<TestDataDir> {
  const dir = await fs.mkdtemp(path.join(os.tmpdir(), `correcao-${prefix}-`));

  return {
    dir,
    cleanup: createCleanupFn(dir),
    escreverJson: async (nome, conteudo) => {
      await fs.writeFile(path.join(dir, nome), JSON.stringify(conteudo, null, 2), 'utf-8');
    },
    lerJson: async (nome) => {
      const texto = await fs.readFile(path.join(dir, nome), 'utf-8');
      const conteudo: unknown = JSON.parse(texto);
      return conteudo;
    }
  };
}

function createCleanupFn(dir: string): () => Promise<void> {
  return async () => {
    for (let attempt = 0; attempt < CLEANUP_RETRIES; attempt++) {
      try {
        await fs.rm(dir, { recursive: true, force: true });
        return;
      } catch (err) {
        if (codigoErro(err) === 'ENOENT') {
          return;
        }

        if (attempt < CLEANUP_RETRIES - 1) {
          await sleep(CLEANUP_DELAYS[attempt]);
        } else {
          console.warn(`[testDataDir] Cleanup failed after ${CLEANUP_RETRIES} attempts: ${dir}`);
        }
      }
    }
  };
}
