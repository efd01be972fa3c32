/**
 * Agent loop with an injected policy and tool set.
 *
 * The policy and tools are plain collaborators bound into node functions
 * when the graph is built; the engine only sees `state -> partial update`.
 */

import { z } from 'zod';
import {
    END,
    MemoryCheckpointer,
    StateGraph,
    append,
    consoleLogger,
} from '../src';

interface Message {
    role: 'user' | 'assistant' | 'tool';
    content: string;
}

interface ToolCall {
    tool: string;
    input: string;
}

interface AgentState {
    messages: Message[];
    pending: ToolCall | null;
}

/** Decides the next assistant move from the transcript */
interface Policy {
    decide(messages: Message[], emit: (chunk: string) => void): Promise<{ reply: string } | { call: ToolCall }>;
}

type Tools = Record<string, (input: string) => Promise<string>>;

const messageSchema = z.object({
    role: z.enum(['user', 'assistant', 'tool']),
    content: z.string(),
});

export function buildAgent(policy: Policy, tools: Tools) {
    return new StateGraph<AgentState>({
        channels: {
            messages: { reducer: append(messageSchema), default: () => [] },
        },
    })
        .addNode('agent', async (state, context) => {
            const move = await policy.decide(state.messages, context.emit);
            if ('call' in move) {
                return { pending: move.call };
            }
            return { messages: [{ role: 'assistant', content: move.reply }], pending: null };
        })
        .addNode('tools', async (state) => {
            if (!state.pending) return {};

            const run = tools[state.pending.tool];
            const content = run ? await run(state.pending.input) : `Unknown tool: ${state.pending.tool}`;
            return { messages: [{ role: 'tool', content }], pending: null };
        })
        .addConditionalEdges('agent', (state) => (state.pending ? 'act' : 'answer'), { act: 'tools', answer: END })
        .addEdge('tools', 'agent')
        .setEntryPoint('agent');
}

/** Scripted policy: looks up the time once, then answers */
const scriptedPolicy: Policy = {
    async decide(messages, emit) {
        const observation = messages.find(m => m.role === 'tool');
        if (!observation) {
            return { call: { tool: 'clock', input: 'UTC' } };
        }

        const reply = `It is ${observation.content}.`;
        for (const word of reply.split(' ')) {
            emit(`${word} `);
        }
        return { reply };
    },
};

async function main(): Promise<void> {
    const app = buildAgent(scriptedPolicy, {
        clock: async (zone) => `${new Date().toISOString()} ${zone}`,
    }).compile({
        checkpointer: new MemoryCheckpointer<AgentState>(),
        logger: consoleLogger,
        interruptBefore: ['tools'],
    });

    const thread = { threadId: 'demo' };

    // suspends before the tool runs so a caller could review the call
    const suspended = await app.invoke({ messages: [{ role: 'user', content: 'What time is it?' }], pending: null }, thread);
    console.log('pending tool call:', suspended.pending);

    for await (const event of app.stream(null, thread)) {
        if (event.type === 'token') process.stdout.write(event.chunk);
    }
    process.stdout.write('\n');

    const history = await app.getHistory(thread);
    console.log(`snapshots: ${history.map(s => `${s.step}:${s.metadata.node ?? s.metadata.source}`).join(' <- ')}`);
}

main().catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
});
