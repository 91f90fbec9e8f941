import type { en } from './en';

export const zhCN: typeof en = {
  Bots: {
    notFound: '找不到名为 {botName} 的机器人！',
  },
  Http: {
    notFound: '没有匹配 {method} {path} 的路由',
    unauthorized: '未授权',
    invalidBody: '请求体不是有效的 JSON',
    internalError: '服务器内部错误',
  },
};
