import * as fs from 'fs/promises';
import * as path from 'path';

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

async function existe(caminho: string): Promise<boolean> {
  try {
    await fs.access(caminho);
    return true;
  } catch {
    return false;
  }
}

/**
 * Store de documentos em arquivo JSON (array no topo).
 * - Escrita atômica (via .tmp + rename)
 * - Fila interna de escrita
 * - Recupera de .tmp deixado por crash durante rename
 *
 * Os itens voltam como `unknown`; cada repositório valida o formato.
 */
class JsonFileStore {
  private writeChain: Promise<void> = Promise.resolve();

  constructor(private readonly filePath: string) {}

  get caminho(): string {
    return this.filePath;
  }

  /**
   * Lê todos os itens do arquivo.
   * Retorna array vazio se nem o arquivo nem o .tmp existem.
   */
  async readAll(): Promise<unknown[]> {
    const tmpPath = this.filePath + '.tmp';

    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf-8');
    } catch (error: unknown) {
      if (!isErrnoException(error) || error.code !== 'ENOENT') {
        throw error;
      }
      if (!(await existe(tmpPath))) {
        return [];
      }
      await fs.rename(tmpPath, this.filePath);
      raw = await fs.readFile(this.filePath, 'utf-8');
    }

    const parsed: unknown = JSON.parse(raw);
    if (!Array.isArray(parsed)) {
      throw new Error(`Arquivo ${this.filePath} não contém um array JSON`);
    }
    return parsed;
  }

  /**
   * Escreve todos os itens no arquivo.
   * Um erro numa escrita não impede as seguintes na fila.
   */
  async writeAll(items: readonly unknown[]): Promise<void> {
    const dir = path.dirname(this.filePath);
    const tmpPath = this.filePath + '.tmp';

    const escrita = this.writeChain.then(async () => {
      await fs.mkdir(dir, { recursive: true });
      await fs.writeFile(tmpPath, JSON.stringify(items, null, 2), 'utf-8');
      await fs.rename(tmpPath, this.filePath);
    });

    this.writeChain = escrita.catch(() => undefined);
    return escrita;
  }
}

export { JsonFileStore, isErrnoException };
