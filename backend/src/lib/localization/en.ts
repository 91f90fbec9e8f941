export const en = {
  Bots: {
    notFound: 'Could not find any bot named {botName}!',
  },
  Http: {
    notFound: 'No route matches {method} {path}',
    unauthorized: 'Unauthorized',
    invalidBody: 'Request body is not valid JSON',
    internalError: 'Something went wrong',
  },
};
