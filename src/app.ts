import { logger, parseLogLevel, setLogLevel } from "./logger";
import { loadConfig, findConfigPath, watchConfig } from "./config";
import type { RouterConfig } from "./config";
import { MidiRouter } from "./router";
import { applyConnections, createPlatform, releaseConnections } from "./app/bootstrap";

export interface RunningApp {
  router: MidiRouter;
  /** Arrêt propre: watcher de configuration, connexions et ports. */
  cleanup: () => Promise<void>;
}

/**
 * Point d'entrée de l'hôte.
 * - Charge la configuration et instancie la plateforme + le `MidiRouter`
 * - Établit les connexions déclarées
 * - Recharge les connexions à chaque modification du fichier
 */
export async function startApp(customPath?: string): Promise<RunningApp> {
  const configPath = await findConfigPath(customPath);
  if (!configPath) {
    throw new Error("config.yaml introuvable");
  }

  let cfg: RouterConfig = await loadConfig(configPath);
  setLogLevel(process.env.LOG_LEVEL ? parseLogLevel(process.env.LOG_LEVEL) : cfg.log_level ?? "info");
  logger.info(`Configuration chargée: ${configPath} (backend=${cfg.backend})`);

  const router = new MidiRouter(createPlatform(cfg));
  for (const d of router.listDevices()) {
    logger.debug(`Périphérique: '${d.name}' (tx=${d.maxTransmitters}, rx=${d.maxReceivers})`);
  }
  let applied = applyConnections(router, cfg);
  logger.info(`${applied.length} connexion(s) établie(s).`);

  const stopWatch = watchConfig(
    configPath,
    (next) => {
      if (next.backend !== cfg.backend) {
        logger.warn(`Changement de backend (${cfg.backend} -> ${next.backend}) ignoré: redémarrage requis.`);
      }
      releaseConnections(router, applied);
      applied = [];
      try {
        applied = applyConnections(router, next);
        cfg = { ...next, backend: cfg.backend };
        logger.info(`Configuration rechargée: ${applied.length} connexion(s).`);
      } catch (err) {
        logger.error("Rechargement des connexions échoué:", err);
      }
      try {
        router.closeIdlePorts();
      } catch (err) {
        logger.warn("Fermeture des ports inutilisés échouée:", err);
      }
    },
    (err) => logger.warn("Erreur hot reload config:", err)
  );

  const cleanup = async (): Promise<void> => {
    stopWatch();
    router.shutdown();
  };
  return { router, cleanup };
}

const invokedDirectly = typeof require !== "undefined" && typeof module !== "undefined" && require.main === module;
if (invokedDirectly) {
  startApp(process.argv[2])
    .then(({ cleanup }) => {
      const onSig = (): void => {
        cleanup()
          .then(() => process.exit(0))
          .catch((err: unknown) => {
            logger.error("Arrêt en erreur:", err);
            process.exit(1);
          });
      };
      process.on("SIGINT", onSig);
      process.on("SIGTERM", onSig);
    })
    .catch((error: unknown) => {
      logger.error("Erreur fatale:", error);
      process.exit(1);
    });
}
