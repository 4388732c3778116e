import { z } from "zod";
import type { Tool } from "@helpdesk/types";
import { ToolError } from "@helpdesk/core";
import { defineTool } from "@helpdesk/runtime";
import type { Order } from "./data.js";

export function orderTools(orders: Readonly<Record<string, Order>>): Tool[] {
  const getOrderStatus = defineTool({
    id: "get_order_status",
    description: "Look up the shipping status of an order by its number",
    parameters: {
      orderId: z
        .string()
        .min(1)
        .transform((id) => id.replace(/^#/, "").trim())
        .describe("The order number, e.g. '12345'"),
    },
    execute({ orderId }, ctx) {
      const order = orders[orderId];
      if (!order) {
        throw new ToolError("NotFound", "get_order_status", `Order ${orderId} not found`);
      }

      ctx.scratch.set("lastOrderId", orderId);
      let summary = `Order ${orderId} (${order.item}) is ${order.status}.`;
      if (order.estimatedDelivery) summary += ` Estimated delivery: ${order.estimatedDelivery}.`;

      return {
        result: { orderId, ...order, summary },
        effect: { type: "order_fetched", data: { orderId, status: order.status } },
      };
    },
  });

  return [getOrderStatus];
}
