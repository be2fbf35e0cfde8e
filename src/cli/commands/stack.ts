import { formatStatusTable, ui } from "../ui";
import { composeInteractive, defineComposeCommand } from "./compose-command";

const UP_ARGS = ["up", "-d", "--remove-orphans"];

export const pullCommand = defineComposeCommand({
  name: "pull",
  summary: "Pull the images referenced by the compose file",
  usage: "pull [OPTIONS]",
  description: "Runs compose pull. Also available as build.",
  action: (rt) => composeInteractive(rt, ["pull"]),
});

export const startCommand = defineComposeCommand({
  name: "start",
  summary: "Start or update the stack",
  usage: "start [OPTIONS]",
  description: "Runs compose up -d --remove-orphans, then shows the containers.\nAlso available as up.",
  action: async (rt) => {
    const code = await composeInteractive(rt, UP_ARGS);
    if (code !== 0) return code;
    return composeInteractive(rt, ["ps"]);
  },
});

export const stopCommand = defineComposeCommand({
  name: "stop",
  summary: "Gracefully stop the services",
  usage: "stop [OPTIONS]",
  description: "Runs compose stop. Containers and volumes are kept.",
  action: (rt) => composeInteractive(rt, ["stop"]),
});

export const downCommand = defineComposeCommand({
  name: "down",
  summary: "Stop and remove containers and network",
  usage: "down [OPTIONS]",
  description: "Runs compose down. Volumes are kept.",
  action: (rt) => composeInteractive(rt, ["down"]),
});

export const restartCommand = defineComposeCommand({
  name: "restart",
  summary: "Restart all services",
  usage: "restart [OPTIONS]",
  description: "Runs compose restart, then shows the containers.",
  action: async (rt) => {
    const code = await composeInteractive(rt, ["restart"]);
    if (code !== 0) return code;
    return composeInteractive(rt, ["ps"]);
  },
});

export const statusCommand = defineComposeCommand({
  name: "status",
  summary: "Show container status",
  usage: "status [OPTIONS]",
  description: "Lists every service container with its state and health.\nAlso available as ps.",
  action: async (rt) => {
    const services = await rt.stack.status();
    if (services.length === 0) {
      ui.info("No containers. Start the stack first.");
      return 0;
    }

    ui.note(formatStatusTable(services), "Services");

    const unhealthy = services.filter((s) => s.running && !s.healthy);
    for (const s of unhealthy) {
      ui.warn(`${s.service} is running but ${s.health}`);
    }
    return 0;
  },
});

export const logsCommand = defineComposeCommand({
  name: "logs",
  summary: "Show service logs",
  usage: "logs [SERVICE] [COMPOSE LOGS OPTIONS]",
  description:
    "Arguments are passed to compose logs. Without arguments, follows the last\n100 lines of every service.",
  passthrough: true,
  action: (rt, args) => composeInteractive(rt, ["logs", ...(args.length > 0 ? args : ["-f", "--tail=100"])]),
});

export const upgradeCommand = defineComposeCommand({
  name: "upgrade",
  summary: "Pull the latest images and recreate the containers",
  usage: "upgrade [OPTIONS]",
  description:
    "Runs compose pull, compose up -d --remove-orphans, prunes dangling images\nand shows the containers. A failed prune only warns.",
  action: async (rt) => {
    ui.step("Pulling images...");
    const pulled = await composeInteractive(rt, ["pull"]);
    if (pulled !== 0) return pulled;

    ui.step("Recreating containers...");
    const up = await composeInteractive(rt, UP_ARGS);
    if (up !== 0) return up;

    const pruned = await rt.docker.pruneImages();
    if (!pruned.success) {
      ui.warn(`Image prune failed (exit code ${pruned.exitCode}); continuing`);
    }

    return composeInteractive(rt, ["ps"]);
  },
});
