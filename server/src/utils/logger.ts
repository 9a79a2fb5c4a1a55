type Fields = Record<string, unknown>;

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel | 'silent', number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

function isLevel(raw: string): raw is keyof typeof LEVEL_ORDER {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, raw);
}

function threshold(): number {
  const raw = String(process.env.LOG_LEVEL || 'info').toLowerCase();
  return isLevel(raw) ? LEVEL_ORDER[raw] : LEVEL_ORDER.info;
}

function toErrorPayload(err: unknown) {
  if (err === undefined || err === null) return undefined;
  if (err instanceof Error) {
    return { name: err.name, message: err.message, stack: err.stack };
  }
  if (typeof err === 'object') return err;
  return { message: String(err) };
}

function emit(level: LogLevel, msg: string | undefined, fields: Fields = {}) {
  if (LEVEL_ORDER[level] < threshold()) return;
  const payload: Fields = {
    level,
    time: new Date().toISOString(),
    ...fields,
    msg: msg || (typeof fields.msg === 'string' ? fields.msg : '')
  };
  if ('err' in fields) payload.err = toErrorPayload(fields.err);
  const line = JSON.stringify(payload);
  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
}

function method(level: LogLevel) {
  return (arg1?: string | Fields, arg2?: string) => {
    if (typeof arg1 === 'string') return emit(level, arg1);
    emit(level, arg2, arg1);
  };
}

export const logger = {
  debug: method('debug'),
  info: method('info'),
  warn: method('warn'),
  error: method('error')
};
