import { httpEndpoint, json } from "../../shared/http/endpoint";

export const getHealth = httpEndpoint(async ({ gateway }) => {
	return json(200, {
		ok: true,
		service: "host",
		time: new Date().toISOString(),
		subscribers: gateway.subscriberCount
	});
}, { name: "health.get" });
