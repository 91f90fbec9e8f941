import { getServices } from '../../core/services';
import { okResponse } from '../../utils/genericResponse';
import { registerRoute } from '../../utils/routesRegistry';

registerRoute('get', '/Api/Health', (_req, res) => {
  const bots = getServices().bots.listBots();
  const loggedOn = bots.filter((bot) => bot.enabled && bot.webSession).length;

  res.json(okResponse({
    status: loggedOn > 0 ? 'green' : 'amber',
    uptime: process.uptime(),
    timestamp: new Date().toISOString(),
    bots: {
      total: bots.length,
      loggedOn,
    },
  }));
}, { protected: true });
