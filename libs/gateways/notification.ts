import {
    CreateTopicCommand,
    ListSubscriptionsByTopicCommand,
    ListTopicsCommand,
    PublishCommand,
    SNSClient,
    SubscribeCommand,
    type ListSubscriptionsByTopicCommandOutput,
    type ListTopicsCommandOutput,
} from "@aws-sdk/client-sns";

export type Subscription = {
    subscriptionArn: string;
    protocol: string;
    endpoint: string;
};

export interface NotificationGateway {
    getTopicArn(name: string): Promise<string | undefined>;
    createTopic(name: string): Promise<string>;
    listSubscriptions(topicArn: string): Promise<Subscription[]>;
    /** Returns the subscription ARN, or `PendingConfirmation` for an unconfirmed email. */
    subscribe(topicArn: string, protocol: string, endpoint: string): Promise<string>;
    /** Returns the message id. */
    publish(topicArn: string, subject: string, message: string): Promise<string | undefined>;
}

// arn:aws:sns:<region>:<account>:<name>
export function topicNameOf(arn: string): string {
    return arn.slice(arn.lastIndexOf(":") + 1);
}

export class SnsNotificationGateway implements NotificationGateway {
    constructor(private readonly sns: SNSClient) {}

    async getTopicArn(name: string): Promise<string | undefined> {
        let NextToken: string | undefined = undefined;
        do {
            const out: ListTopicsCommandOutput = await this.sns.send(new ListTopicsCommand({ NextToken }));
            const match = (out.Topics ?? []).find(t => t.TopicArn && topicNameOf(t.TopicArn) === name);
            if (match?.TopicArn) return match.TopicArn;
            NextToken = out.NextToken;
        } while (NextToken);
        return undefined;
    }

    async createTopic(name: string): Promise<string> {
        const out = await this.sns.send(new CreateTopicCommand({ Name: name }));
        if (!out.TopicArn) throw new Error(`CreateTopic returned no ARN for ${name}`);
        return out.TopicArn;
    }

    async listSubscriptions(topicArn: string): Promise<Subscription[]> {
        let NextToken: string | undefined = undefined;
        const items: Subscription[] = [];
        do {
            const out: ListSubscriptionsByTopicCommandOutput = await this.sns.send(
                new ListSubscriptionsByTopicCommand({ TopicArn: topicArn, NextToken }),
            );
            for (const s of out.Subscriptions ?? []) {
                items.push({
                    subscriptionArn: s.SubscriptionArn ?? "",
                    protocol: s.Protocol ?? "",
                    endpoint: s.Endpoint ?? "",
                });
            }
            NextToken = out.NextToken;
        } while (NextToken);
        return items;
    }

    async subscribe(topicArn: string, protocol: string, endpoint: string): Promise<string> {
        const out = await this.sns.send(new SubscribeCommand({ TopicArn: topicArn, Protocol: protocol, Endpoint: endpoint }));
        return out.SubscriptionArn ?? "PendingConfirmation";
    }

    async publish(topicArn: string, subject: string, message: string): Promise<string | undefined> {
        const out = await this.sns.send(new PublishCommand({ TopicArn: topicArn, Subject: subject, Message: message }));
        return out.MessageId;
    }
}
