/**
 * Resultado tagueado para falhas locais esperadas.
 *
 * Falhas inesperadas (I/O) continuam propagando como exceção.
 */

type Resultado<T, E> =
  | { ok: true; valor: T }
  | { ok: false; erro: E };

function sucesso<T>(valor: T): { ok: true; valor: T } {
  return { ok: true, valor };
}

function falha<E>(erro: E): { ok: false; erro: E } {
  return { ok: false, erro };
}

export { sucesso, falha };
export type { Resultado };
