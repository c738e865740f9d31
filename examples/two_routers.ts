// examples/two_routers.ts
//
// Demonstrates: Two routers in one process sharing a single service instance
// Run: npx ts-node examples/two_routers.ts
//
// This example shows:
// - Wiring routers together with InMemoryTransport and StaticCluster
// - Feeding both routers the same scheduler snapshot
// - The router that does not own the instance borrowing it through work-stealing
// - Blacklisting an instance and reading the responder state back
// - LOG_FORMAT=json switches logging to one JSON line per entry

import {
  InMemoryServiceDescriptionStore,
  InMemoryTransport,
  SchedulerState,
  StaticCluster,
  createRouter,
  jsonLogHandler,
  loggerConfig,
  ownerOf,
} from "../src";

const ROUTER_IDS = ["router-a", "router-b"];

const instance = { id: "web-1", serviceId: "web", host: "127.0.0.1", port: 8080 };

const state: SchedulerState = {
  availableServiceIds: ["web"],
  serviceIdToHealthyInstances: { web: [instance] },
  serviceIdToUnhealthyInstances: { web: [] },
  serviceIdToKilledInstances: { web: [] },
  time: Date.now(),
};

async function main() {
  if (process.env.LOG_FORMAT === "json") {
    loggerConfig.configure({ handler: jsonLogHandler });
  }

  const descriptions = new InMemoryServiceDescriptionStore();
  descriptions.put("web", { name: "Web", concurrencyLevel: 1 });

  const transports = ROUTER_IDS.map((id) => new InMemoryTransport(id));
  InMemoryTransport.connectAll(transports);

  const routers = await Promise.all(
    ROUTER_IDS.map((routerId, index) =>
      createRouter({
        routerId,
        config: { offerHelpIntervalMs: 50 },
        descriptions,
        transport: transports[index],
        cluster: new StaticCluster(routerId, ROUTER_IDS),
      }),
    ),
  );

  for (const router of routers) {
    router.publishSchedulerState(state);
  }

  const ownerId = ownerOf(instance.id, ROUTER_IDS);
  const borrower = routers.find((router) => router.routerId !== ownerId) ?? routers[0];
  console.log(`${ownerId} owns ${instance.id}; ${borrower.routerId} will borrow it`);

  const acquired = await borrower.acquireInstance("web");
  console.log(`${borrower.routerId} got ${acquired.instance.id} (stolen: ${acquired.stolen})`);
  borrower.releaseInstance("web", acquired.instance.id, "success");

  const owner = routers.find((router) => router.routerId === ownerId) ?? routers[0];
  const status = await owner.blacklistInstance("web", instance.id, 1000, "instance-error");
  console.log(`Blacklisting ${instance.id} on ${owner.routerId}: ${status}`);
  console.log(await owner.queryState("web"));

  await Promise.all(routers.map((router) => router.shutdown()));
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
