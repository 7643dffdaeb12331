export const REMOTE_MODEL_SUFFIX = "-cloud"

export type EndpointRouterConfig = {
  localBaseUrl: string
  remoteBaseUrl: string
  apiKey: string | null
  authScheme: string
}

export type EndpointRouter = {
  isRemoteModel: (model: string) => boolean
  /** Local models always; remote ones only while a credential is configured. */
  isRoutable: (model: string) => boolean
  targetBaseUrl: (model: string) => string
  authHeaders: (model: string) => Record<string, string>
  /** Inventory listing always targets the local backend. */
  localBaseUrl: () => string
}

const trimTrailingSlash = (value: string): string => {
  return value.replace(/\/+$/, "")
}

/**
 * Routes a model to the local backend or the authenticated remote one. Decisions depend
 * only on the `-cloud` name suffix and whether an API key is configured.
 *
 * @param config Base URLs and credential settings.
 * @returns Pure routing helpers.
 */
export const createEndpointRouter = (config: EndpointRouterConfig): EndpointRouter => {
  const localBaseUrl = trimTrailingSlash(config.localBaseUrl)
  const remoteBaseUrl = trimTrailingSlash(config.remoteBaseUrl)
  const apiKey = config.apiKey?.trim() || null

  const isRemoteModel = (model: string): boolean => {
    return model.trim().toLowerCase().endsWith(REMOTE_MODEL_SUFFIX)
  }

  const usesRemote = (model: string): boolean => {
    return isRemoteModel(model) && apiKey !== null
  }

  return {
    isRemoteModel,
    isRoutable: (model) => !isRemoteModel(model) || apiKey !== null,
    targetBaseUrl: (model) => (usesRemote(model) ? remoteBaseUrl : localBaseUrl),
    authHeaders: (model): Record<string, string> => {
      if (!usesRemote(model) || apiKey === null) {
        return {}
      }

      return {
        authorization: `${config.authScheme} ${apiKey}`,
      }
    },
    localBaseUrl: () => localBaseUrl,
  }
}
