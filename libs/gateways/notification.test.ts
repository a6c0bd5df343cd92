import {
    CreateTopicCommand,
    ListSubscriptionsByTopicCommand,
    ListTopicsCommand,
    PublishCommand,
    SNSClient,
    SubscribeCommand,
} from "@aws-sdk/client-sns";
import { SnsNotificationGateway, topicNameOf } from "./notification";

const ARN = "arn:aws:sns:us-east-1:000000000000:SalesFilesMoved";

function gatewayWith(impl: (command: unknown) => object) {
    const sns = new SNSClient({ region: "us-east-1" });
    const sent: unknown[] = [];
    jest.spyOn(sns, "send").mockImplementation(async (command: unknown) => {
        sent.push(command);
        return { $metadata: {}, ...impl(command) };
    });
    return { gateway: new SnsNotificationGateway(sns), sent };
}

test("topicNameOf takes the last ARN segment", () => {
    expect(topicNameOf(ARN)).toBe("SalesFilesMoved");
});

test("getTopicArn matches the exact topic name across pages", async () => {
    const { gateway, sent } = gatewayWith((c) => {
        if (!(c instanceof ListTopicsCommand)) return {};
        if (!c.input.NextToken) {
            return { Topics: [{ TopicArn: "arn:aws:sns:us-east-1:000000000000:SalesFilesMovedOld" }], NextToken: "p2" };
        }
        return { Topics: [{ TopicArn: ARN }] };
    });

    await expect(gateway.getTopicArn("SalesFilesMoved")).resolves.toBe(ARN);
    expect(sent).toHaveLength(2);
});

test("getTopicArn returns undefined when no topic matches", async () => {
    const { gateway } = gatewayWith(() => ({ Topics: [] }));
    await expect(gateway.getTopicArn("SalesFilesMoved")).resolves.toBeUndefined();
});

test("createTopic returns the new ARN", async () => {
    const { gateway } = gatewayWith((c) => (c instanceof CreateTopicCommand ? { TopicArn: ARN } : {}));
    await expect(gateway.createTopic("SalesFilesMoved")).resolves.toBe(ARN);
});

test("listSubscriptions flattens every page", async () => {
    const { gateway } = gatewayWith((c) => {
        if (!(c instanceof ListSubscriptionsByTopicCommand)) return {};
        return c.input.NextToken
            ? { Subscriptions: [{ SubscriptionArn: "PendingConfirmation", Protocol: "email", Endpoint: "b@example.com" }] }
            : { Subscriptions: [{ SubscriptionArn: `${ARN}:1`, Protocol: "email", Endpoint: "a@example.com" }], NextToken: "n" };
    });

    await expect(gateway.listSubscriptions(ARN)).resolves.toEqual([
        { subscriptionArn: `${ARN}:1`, protocol: "email", endpoint: "a@example.com" },
        { subscriptionArn: "PendingConfirmation", protocol: "email", endpoint: "b@example.com" },
    ]);
});

test("subscribe and publish pass their arguments through", async () => {
    const { gateway, sent } = gatewayWith((c) => (c instanceof PublishCommand ? { MessageId: "m-1" } : {}));

    await expect(gateway.subscribe(ARN, "email", "a@example.com")).resolves.toBe("PendingConfirmation");
    await expect(gateway.publish(ARN, "Files moved for A", "Files moved for A: A_report.csv")).resolves.toBe("m-1");

    const [subscribe, publish] = sent;
    expect(subscribe).toBeInstanceOf(SubscribeCommand);
    expect(publish).toBeInstanceOf(PublishCommand);
    if (publish instanceof PublishCommand) {
        expect(publish.input).toEqual({ TopicArn: ARN, Subject: "Files moved for A", Message: "Files moved for A: A_report.csv" });
    }
});
