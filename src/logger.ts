// 日志模块 - 使用 pino 进行结构化日志记录
// 作为库使用时只写 stdout，不创建日志文件

import pino from 'pino';

// 使用环境变量 LOG_LEVEL 控制日志级别（默认：info）
// 使用环境变量 LOG_FORMAT 控制控制台输出格式：json（默认）或 pretty
const logLevel = process.env.LOG_LEVEL || 'info';
const logFormat = process.env.LOG_FORMAT || 'json';

// 测试环境静默，避免单测输出混入日志
const isTestEnv = process.env.NODE_ENV === 'test' || typeof process.env.JEST_WORKER_ID !== 'undefined';

function createLogger(): pino.Logger {
  if (isTestEnv) {
    return pino({ level: 'silent' });
  }
  if (logFormat === 'pretty') {
    return pino({
      level: logLevel,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss Z',
          ignore: 'pid,hostname',
        },
      },
    });
  }
  return pino({ level: logLevel });
}

const logger = createLogger();

export default logger;
