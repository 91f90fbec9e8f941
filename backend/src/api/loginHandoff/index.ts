import { registerRoute } from '../../utils/routesRegistry';
import {
  oAuthFromBody,
  oAuthFromRoute,
  openIdFromBody,
  openIdFromRoute,
} from './_handlers';

registerRoute('post', '/Api/OAuth', oAuthFromBody, { protected: true });
registerRoute(['get', 'post'], '/Api/OAuth/:botName/:oAuthUrl', oAuthFromRoute, { protected: true });

registerRoute('post', '/Api/OpenId', openIdFromBody, { protected: true });
registerRoute(['get', 'post'], '/Api/OpenId/:botName/:openIdUrl', openIdFromRoute, { protected: true });
